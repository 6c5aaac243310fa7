import { KNOB_SWEEP_DEGREES } from '../constants'
import type { TickMarkGroup } from '../lib/tickMarks'

export type TickMarksProps = {
  group: TickMarkGroup | undefined
  layout: 'horizontal' | 'vertical' | 'radial'
}

export function knobAngle(position: number) {
  return -KNOB_SWEEP_DEGREES / 2 + position * KNOB_SWEEP_DEGREES
}

export function TickMarks({ group, layout }: TickMarksProps) {
  if (!group || group.length === 0) return null

  return (
    <div className={`tick-marks tick-marks-${layout}`} aria-hidden="true">
      {group.map((mark) => {
        const style =
          layout === 'horizontal'
            ? { left: `${mark.position * 100}%` }
            : layout === 'vertical'
              ? { bottom: `${mark.position * 100}%` }
              : { transform: `rotate(${knobAngle(mark.position)}deg)` }
        return (
          <div
            key={`${mark.position}-${mark.tier}`}
            className={`tick-mark tick-${mark.tier}`}
            data-position={mark.position}
            style={style}
          />
        )
      })}
    </div>
  )
}
