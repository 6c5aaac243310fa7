// Ranges mapped by the panel widgets
export const INT_MIN = 0
export const INT_MAX = 10
export const DB_MIN = -12
export const DB_MAX = 12
export const DB_ZERO_POSITION = 0.5
// 10 octaves, 20 Hz * 2^10
export const FREQ_MIN = 20
export const FREQ_MAX = 20480
export const DEFAULT_FREQ = 1000

// Initial widget values (in real-world units)
export const INITIAL_INT_VALUE = 5
export const INITIAL_FREQ_VALUE = 1000

export const BUTTON_ID = 128
export const SLIDER_STEP = 0.025
export const INITIAL_OUTPUT_TEXT = 'try anything'

// Drag gestures
export const FINE_DRAG_SCALAR = 0.1
export const KNOB_DRAG_PIXELS = 200
export const KNOB_SWEEP_DEGREES = 270

// Audio preview sits well under the dB slider so +12 dB stays comfortable
export const PREVIEW_LEVEL_DB = -18
export const PREVIEW_RAMP_SECONDS = 0.05
