import { create } from 'zustand'
import type { Toast } from '@/types/index.ts'

const TOAST_MS = 3000
const ERROR_TOAST_MS = 6000
/** Oldest toasts drop off past this many, so a burst of render errors cannot flood the screen. */
const MAX_TOASTS = 4

interface AppState {
  toasts: Toast[]
  /** Returns the new toast's id. A duration of 0 keeps it until dismissed. */
  addToast: (toast: Omit<Toast, 'id'>) => string
  removeToast: (id: string) => void
}

export const useAppStore = create<AppState>((set, get) => ({
  toasts: [],

  addToast: (toast) => {
    const id = crypto.randomUUID()
    set((s) => ({ toasts: [...s.toasts, { ...toast, id }].slice(-MAX_TOASTS) }))

    const ms = toast.duration ?? (toast.type === 'error' ? ERROR_TOAST_MS : TOAST_MS)
    if (ms > 0) setTimeout(() => get().removeToast(id), ms)
    return id
  },

  removeToast: (id) => set((s) => ({ toasts: s.toasts.filter((t) => t.id !== id) })),
}))
