import type React from 'react'
import type { Normal, NormalParam } from '../types'
import type { TickMarkGroup } from '../lib/tickMarks'
import { clampNormal } from '../lib/range'
import { FINE_DRAG_SCALAR } from '../constants'
import { TickMarks } from './TickMarks'
import { usePointerDrag } from './usePointerDrag'

type Orientation = 'horizontal' | 'vertical'

export type SliderProps = {
  param: NormalParam
  onChange: (normal: Normal) => void
  tickMarks?: TickMarkGroup
  label?: string
  title?: string
}

type SliderDrag = {
  origin: number // clientX or clientY at pointer down
  startNormal: Normal
  length: number // track length in px
  scalar: number
}

function LinearSlider({
  orientation,
  param,
  onChange,
  tickMarks,
  label,
  title,
}: SliderProps & { orientation: Orientation }) {
  const horizontal = orientation === 'horizontal'

  const beginDrag = usePointerDrag<SliderDrag>((event, drag) => {
    // Screen y grows downwards, the vertical slider grows upwards
    const travel = horizontal ? event.clientX - drag.origin : drag.origin - event.clientY
    onChange(clampNormal(drag.startNormal + (travel / drag.length) * drag.scalar))
  })

  const handlePointerDown = (event: React.PointerEvent<HTMLDivElement>) => {
    const rect = event.currentTarget.getBoundingClientRect()
    const length = horizontal ? rect.width : rect.height
    if (length <= 0) return
    event.preventDefault()
    beginDrag({
      origin: horizontal ? event.clientX : event.clientY,
      startNormal: param.value,
      length,
      scalar: event.shiftKey ? FINE_DRAG_SCALAR : 1,
    })
  }

  const percent = `${param.value * 100}%`

  return (
    <div
      className={`param-slider param-slider-${orientation}`}
      role="slider"
      aria-label={label}
      aria-orientation={orientation}
      aria-valuemin={0}
      aria-valuemax={1}
      aria-valuenow={param.value}
      title={title}
      onPointerDown={handlePointerDown}
      onDoubleClick={() => onChange(param.default)}
    >
      <div className="param-slider-rail" />
      <TickMarks group={tickMarks} layout={orientation} />
      <div className="param-slider-handle" style={horizontal ? { left: percent } : { bottom: percent }} />
    </div>
  )
}

export function HSlider(props: SliderProps) {
  return <LinearSlider orientation="horizontal" {...props} />
}

export function VSlider(props: SliderProps) {
  return <LinearSlider orientation="vertical" {...props} />
}
