import type React from 'react'
import type { Normal, NormalParam } from '../types'
import { clampNormal } from '../lib/range'
import { usePointerDrag } from './usePointerDrag'

export type XYPadProps = {
  paramX: NormalParam
  paramY: NormalParam
  onChange: (x: Normal, y: Normal) => void
  label?: string
  title?: string
}

type PadRect = {
  left: number
  top: number
  width: number
  height: number
}

// Pointer position inside the pad, y counted from the bottom edge
const pointToNormals = (rect: PadRect, clientX: number, clientY: number): [Normal, Normal] => [
  clampNormal((clientX - rect.left) / rect.width),
  clampNormal(1 - (clientY - rect.top) / rect.height),
]

export function XYPad({ paramX, paramY, onChange, label, title }: XYPadProps) {
  const beginDrag = usePointerDrag<PadRect>((event, rect) => {
    const [x, y] = pointToNormals(rect, event.clientX, event.clientY)
    onChange(x, y)
  })

  const handlePointerDown = (event: React.PointerEvent<HTMLDivElement>) => {
    const { left, top, width, height } = event.currentTarget.getBoundingClientRect()
    if (width <= 0 || height <= 0) return
    event.preventDefault()
    const rect = { left, top, width, height }
    const [x, y] = pointToNormals(rect, event.clientX, event.clientY)
    onChange(x, y)
    beginDrag(rect)
  }

  return (
    <div
      className="param-xy-pad"
      role="group"
      aria-label={label}
      title={title}
      onPointerDown={handlePointerDown}
      onDoubleClick={() => onChange(paramX.default, paramY.default)}
    >
      <div className="param-xy-crosshair param-xy-crosshair-x" style={{ left: `${paramX.value * 100}%` }} />
      <div className="param-xy-crosshair param-xy-crosshair-y" style={{ bottom: `${paramY.value * 100}%` }} />
      <div
        className="param-xy-handle"
        style={{ left: `${paramX.value * 100}%`, bottom: `${paramY.value * 100}%` }}
      />
    </div>
  )
}
