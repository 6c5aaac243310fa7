import { useEffect, useRef, useState } from 'react'
import { HSlider, VSlider } from './components/Slider'
import { Knob } from './components/Knob'
import { XYPad } from './components/XYPad'
import { usePanelStore } from './store/usePanelStore'
import { unmapToValue } from './lib/range'
import { createPreviewVoice } from './lib/preview'
import type { PreviewVoice } from './lib/preview'
import type { Lang } from './i18n'
import { getTranslations } from './i18n'
import { SLIDER_STEP } from './constants'
import './App.css'

function App() {
  const {
    sliderValue,
    buttonId,
    ranges,
    params,
    centerTickMarks,
    knobTickMarks,
    outputText,
    dispatch,
    reset,
  } = usePanelStore()

  const [lang, setLang] = useState<Lang>('en')
  const t = getTranslations(lang)

  const [isPreviewing, setIsPreviewing] = useState(false)
  const [previewFailed, setPreviewFailed] = useState(false)
  const previewRef = useRef<PreviewVoice | null>(null)

  const frequency = unmapToValue(ranges.freq, params.knob.value)
  const levelDb = unmapToValue(ranges.db, params.vSlider.value)

  useEffect(() => {
    document.title = t.title
  }, [t.title])

  useEffect(() => {
    return () => {
      previewRef.current?.dispose()
      previewRef.current = null
    }
  }, [])

  // Follow the knob and the dB slider while the preview plays
  useEffect(() => {
    if (isPreviewing) {
      previewRef.current?.update(frequency, levelDb)
    }
  }, [isPreviewing, frequency, levelDb])

  const handlePreviewToggle = async () => {
    if (isPreviewing) {
      previewRef.current?.stop()
      setIsPreviewing(false)
      return
    }
    try {
      if (!previewRef.current) {
        previewRef.current = createPreviewVoice()
      }
      await previewRef.current.start(frequency, levelDb)
      setPreviewFailed(false)
      setIsPreviewing(true)
    } catch (error) {
      console.error(error)
      setPreviewFailed(true)
    }
  }

  return (
    <div className="app-shell">
      <header className="topbar">
        <div>
          <p className="eyebrow">{t.eyebrow}</p>
          <h1>{t.title}</h1>
          <p className="muted">{t.subtitle}</p>
        </div>
        <div className="actions">
          <button className="primary" onClick={handlePreviewToggle} title={t.previewTooltip}>
            {isPreviewing ? t.stopPreview : t.startPreview}
          </button>
          <button className="soft" onClick={reset} title={t.resetTooltip}>
            {t.reset}
          </button>
          <button
            className="icon-toggle"
            onClick={() => setLang(lang === 'zh' ? 'en' : 'zh')}
            title={t.switchLanguage}
          >
            <span className="lang-label">{lang === 'zh' ? 'EN' : '中'}</span>
          </button>
        </div>
      </header>

      {previewFailed && <div className="notice">{t.previewFailed}</div>}

      <section className="panel">
        <div className="controls">
          <label className="control">
            <span className="control-label">{t.slider}</span>
            <input
              type="range"
              min={0}
              max={1}
              step={SLIDER_STEP}
              value={sliderValue}
              onChange={(e) => dispatch({ type: 'sliderChanged', value: Number(e.target.value) })}
            />
          </label>

          <button className="soft" onClick={() => dispatch({ type: 'buttonClicked', id: buttonId })}>
            {t.clickHere}
          </button>

          <div className="control">
            <span className="control-label">{t.intSlider}</span>
            <HSlider
              param={params.hSlider}
              onChange={(normal) => dispatch({ type: 'hSliderInt', normal })}
              tickMarks={centerTickMarks}
              label={t.intSlider}
              title={t.resetHint}
            />
          </div>

          <div className="control">
            <span className="control-label">{t.dbSlider}</span>
            <VSlider
              param={params.vSlider}
              onChange={(normal) => dispatch({ type: 'vSliderDb', normal })}
              tickMarks={centerTickMarks}
              label={t.dbSlider}
              title={t.resetHint}
            />
          </div>

          <div className="control">
            <span className="control-label">{t.freqKnob}</span>
            <Knob
              param={params.knob}
              onChange={(normal) => dispatch({ type: 'knobFreq', normal })}
              tickMarks={knobTickMarks}
              label={t.freqKnob}
              title={t.resetHint}
            />
          </div>

          <div className="control">
            <span className="control-label">{t.xyPad}</span>
            <XYPad
              paramX={params.xyPadX}
              paramY={params.xyPadY}
              onChange={(x, y) => dispatch({ type: 'xyPadFloat', x, y })}
              label={t.xyPad}
              title={t.resetHint}
            />
          </div>

          <div className="status">{outputText}</div>
        </div>
      </section>
    </div>
  )
}

export default App
