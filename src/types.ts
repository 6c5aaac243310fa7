// Widget position independent of any unit, 0..1
export type Normal = number

export type NormalParam = {
  value: Normal
  default: Normal // restored on reset
}

export type PanelEvent =
  | { type: 'sliderChanged'; value: number }
  | { type: 'buttonClicked'; id: number }
  | { type: 'hSliderInt'; normal: Normal }
  | { type: 'vSliderDb'; normal: Normal }
  | { type: 'knobFreq'; normal: Normal }
  | { type: 'xyPadFloat'; x: Normal; y: Normal }
