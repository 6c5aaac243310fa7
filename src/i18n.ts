export type Lang = 'zh' | 'en'

const en = {
  // Header
  eyebrow: 'Audio Parameters',
  title: 'Parameter Panel',
  subtitle: 'Drag a widget to map its position into a real-world unit.',
  startPreview: 'Preview',
  stopPreview: 'Stop',
  previewTooltip: 'Play a sine tone at the knob frequency and slider level',
  reset: 'Reset',
  resetTooltip: 'Return every widget to its starting position',
  switchLanguage: 'Switch to Chinese',

  // Widgets
  slider: 'Slider',
  clickHere: 'Click here',
  intSlider: 'Steps (0 to 10)',
  dbSlider: 'Level (dB)',
  freqKnob: 'Frequency',
  xyPad: 'XY (-1 to 1)',
  resetHint: 'Double-click to reset, hold Shift for fine control',

  // Notices
  previewFailed: 'Audio preview could not start',
}

const zh: typeof en = {
  // Header
  eyebrow: '音频参数',
  title: '参数面板',
  subtitle: '拖动控件，将其位置映射为实际数值。',
  startPreview: '试听',
  stopPreview: '停止',
  previewTooltip: '按旋钮频率和推子电平播放正弦波',
  reset: '重置',
  resetTooltip: '将所有控件恢复到初始位置',
  switchLanguage: 'Switch to English',

  // Widgets
  slider: '滑块',
  clickHere: '点这里',
  intSlider: '步进 (0 到 10)',
  dbSlider: '电平 (dB)',
  freqKnob: '频率',
  xyPad: 'XY (-1 到 1)',
  resetHint: '双击重置，按住 Shift 微调',

  // Notices
  previewFailed: '无法启动音频试听',
}

const translations: Record<Lang, typeof en> = { zh, en }

export type Translations = typeof en

export function getTranslations(lang: Lang): Translations {
  return translations[lang]
}
