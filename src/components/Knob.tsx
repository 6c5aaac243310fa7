import type React from 'react'
import type { Normal, NormalParam } from '../types'
import type { TickMarkGroup } from '../lib/tickMarks'
import { clampNormal } from '../lib/range'
import { FINE_DRAG_SCALAR, KNOB_DRAG_PIXELS } from '../constants'
import { TickMarks, knobAngle } from './TickMarks'
import { usePointerDrag } from './usePointerDrag'

export type KnobProps = {
  param: NormalParam
  onChange: (normal: Normal) => void
  tickMarks?: TickMarkGroup
  label?: string
  title?: string
}

type KnobDrag = {
  originY: number
  startNormal: Normal
  scalar: number
}

export function Knob({ param, onChange, tickMarks, label, title }: KnobProps) {
  const beginDrag = usePointerDrag<KnobDrag>((event, drag) => {
    const travel = drag.originY - event.clientY // drag up = turn clockwise
    onChange(clampNormal(drag.startNormal + (travel / KNOB_DRAG_PIXELS) * drag.scalar))
  })

  const handlePointerDown = (event: React.PointerEvent<HTMLDivElement>) => {
    event.preventDefault()
    beginDrag({
      originY: event.clientY,
      startNormal: param.value,
      scalar: event.shiftKey ? FINE_DRAG_SCALAR : 1,
    })
  }

  return (
    <div
      className="param-knob"
      role="slider"
      aria-label={label}
      aria-valuemin={0}
      aria-valuemax={1}
      aria-valuenow={param.value}
      title={title}
      onPointerDown={handlePointerDown}
      onDoubleClick={() => onChange(param.default)}
    >
      <TickMarks group={tickMarks} layout="radial" />
      <div className="param-knob-body" style={{ transform: `rotate(${knobAngle(param.value)}deg)` }}>
        <div className="param-knob-pointer" />
      </div>
    </div>
  )
}
