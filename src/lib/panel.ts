import type { NormalParam, PanelEvent } from '../types'
import {
  BUTTON_ID,
  DB_MAX,
  DB_MIN,
  DB_ZERO_POSITION,
  FREQ_MAX,
  FREQ_MIN,
  INITIAL_FREQ_VALUE,
  INITIAL_INT_VALUE,
  INITIAL_OUTPUT_TEXT,
  INT_MAX,
  INT_MIN,
} from '../constants'
import {
  bipolarFloatRange,
  defaultNormalParam,
  freqRange,
  intRange,
  logDbRange,
  normalParam,
  snapped,
  unmapToValue,
} from './range'
import type { FloatRange, FreqRange, IntRange, LogDbRange } from './range'
import { centerTickMarks, minMaxAndCenterTickMarks } from './tickMarks'
import type { TickMarkGroup } from './tickMarks'

export type PanelRanges = {
  float: FloatRange
  int: IntRange
  db: LogDbRange
  freq: FreqRange
}

export type PanelParams = {
  hSlider: NormalParam
  vSlider: NormalParam
  knob: NormalParam
  xyPadX: NormalParam
  xyPadY: NormalParam
}

export type PanelState = {
  sliderValue: number // plain range input, 0..1
  buttonId: number
  ranges: PanelRanges
  params: PanelParams
  centerTickMarks: TickMarkGroup
  knobTickMarks: TickMarkGroup
  outputText: string
}

export function createPanelState(): PanelState {
  const ranges: PanelRanges = {
    float: bipolarFloatRange(),
    int: intRange(INT_MIN, INT_MAX),
    db: logDbRange(DB_MIN, DB_MAX, DB_ZERO_POSITION),
    freq: freqRange(FREQ_MIN, FREQ_MAX),
  }

  return {
    sliderValue: 0,
    buttonId: BUTTON_ID,
    ranges,
    params: {
      hSlider: normalParam(ranges.int, INITIAL_INT_VALUE, INITIAL_INT_VALUE),
      vSlider: defaultNormalParam(ranges.db),
      knob: normalParam(ranges.freq, INITIAL_FREQ_VALUE, INITIAL_FREQ_VALUE),
      xyPadX: defaultNormalParam(ranges.float),
      xyPadY: defaultNormalParam(ranges.float),
    },
    centerTickMarks: centerTickMarks('two'),
    knobTickMarks: minMaxAndCenterTickMarks('two', 'three'),
    outputText: INITIAL_OUTPUT_TEXT,
  }
}

const withValue = (param: NormalParam, value: number): NormalParam => ({ ...param, value })

export function applyPanelEvent(state: PanelState, event: PanelEvent): PanelState {
  const { ranges, params } = state

  switch (event.type) {
    case 'buttonClicked':
      return { ...state, outputText: `Button Clicked: ${event.id}` }

    case 'sliderChanged':
      return { ...state, sliderValue: event.value, outputText: `Slider Changed: ${event.value}` }

    case 'hSliderInt': {
      // Stored snapped so the slider steps between whole values
      const value = unmapToValue(ranges.int, event.normal)
      return {
        ...state,
        params: { ...params, hSlider: withValue(params.hSlider, snapped(ranges.int, event.normal)) },
        outputText: `HSliderInt: ${value}`,
      }
    }

    case 'vSliderDb': {
      const value = unmapToValue(ranges.db, event.normal)
      return {
        ...state,
        params: { ...params, vSlider: withValue(params.vSlider, event.normal) },
        outputText: `VSliderDB: ${value.toFixed(3)}`,
      }
    }

    case 'knobFreq': {
      const value = unmapToValue(ranges.freq, event.normal)
      return {
        ...state,
        params: { ...params, knob: withValue(params.knob, event.normal) },
        outputText: `KnobFreq: ${value.toFixed(2)}`,
      }
    }

    case 'xyPadFloat': {
      const x = unmapToValue(ranges.float, event.x)
      const y = unmapToValue(ranges.float, event.y)
      return {
        ...state,
        params: {
          ...params,
          xyPadX: withValue(params.xyPadX, event.x),
          xyPadY: withValue(params.xyPadY, event.y),
        },
        outputText: `XYPadFloat: x: ${x.toFixed(2)}, y: ${y.toFixed(2)}`,
      }
    }
  }
}
