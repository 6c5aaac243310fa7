import * as Tone from 'tone'
import { PREVIEW_LEVEL_DB, PREVIEW_RAMP_SECONDS } from '../constants'

export type PreviewVoice = {
  start: (frequency: number, db: number) => Promise<void>
  update: (frequency: number, db: number) => void
  stop: () => void
  dispose: () => void
}

// Sine oscillator following the knob frequency and the dB slider level
export function createPreviewVoice(): PreviewVoice {
  let oscillator: Tone.Oscillator | null = null
  let disposed = false

  return {
    start: async (frequency, db) => {
      // Browsers keep the context suspended until a user gesture resumes it
      await Tone.start()
      // dispose() ran while the context was unlocking
      if (disposed) return
      if (!oscillator) {
        oscillator = new Tone.Oscillator(frequency, 'sine').toDestination()
      }
      oscillator.frequency.value = frequency
      oscillator.volume.value = db + PREVIEW_LEVEL_DB
      if (oscillator.state !== 'started') {
        oscillator.start()
      }
    },
    update: (frequency, db) => {
      if (!oscillator || oscillator.state !== 'started') return
      oscillator.frequency.rampTo(frequency, PREVIEW_RAMP_SECONDS)
      oscillator.volume.rampTo(db + PREVIEW_LEVEL_DB, PREVIEW_RAMP_SECONDS)
    },
    stop: () => {
      if (oscillator && oscillator.state === 'started') {
        oscillator.stop()
      }
    },
    dispose: () => {
      disposed = true
      oscillator?.dispose()
      oscillator = null
    },
  }
}
