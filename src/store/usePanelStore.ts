import { create } from 'zustand'
import type { PanelEvent } from '../types'
import { applyPanelEvent, createPanelState } from '../lib/panel'
import type { PanelState } from '../lib/panel'

export type PanelStore = PanelState & {
  dispatch: (event: PanelEvent) => void
  reset: () => void
}

export const usePanelStore = create<PanelStore>((set) => ({
  ...createPanelState(),
  dispatch: (event) => set((state) => applyPanelEvent(state, event)),
  reset: () => set(() => createPanelState()),
}))
