import type { RenderHint } from './types.ts'

/** What the keyboard can drive; the engine satisfies it. */
export interface ShortcutTarget {
  startLine(): RenderHint
  finishLine(): RenderHint
  escape(): RenderHint
  deleteSelected(): RenderHint
  zoomIn(): void
  zoomOut(): void
  resetZoom(): void
  nextPage(): Promise<void>
  prevPage(): Promise<void>
}

export interface ShortcutHandlers {
  onSave: () => void
}

function isTyping(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false
  const tag = target.tagName
  return tag === 'INPUT' || tag === 'TEXTAREA' || tag === 'SELECT' || target.isContentEditable
}

/**
 * Attach keyboard shortcuts to the document.
 * Returns a cleanup function for useEffect.
 */
export function attachShortcuts(target: ShortcutTarget, handlers: ShortcutHandlers): () => void {
  const handler = (e: KeyboardEvent) => {
    if (isTyping(e.target)) return
    const isMod = e.metaKey || e.ctrlKey
    const key = e.key.toLowerCase()

    if (e.key === 'Escape') {
      target.escape()
      return
    }

    // ── Line creation ─────────────────────────
    if (isMod && key === 'l') {
      e.preventDefault()
      target.startLine()
      return
    }
    if (e.key === 'Enter') {
      target.finishLine()
      return
    }

    if (e.key === 'Delete' || e.key === 'Backspace') {
      if (target.deleteSelected() !== 'none') e.preventDefault()
      return
    }

    // ── Zoom ──────────────────────────────────
    if (isMod && (e.key === '=' || e.key === '+')) {
      e.preventDefault()
      target.zoomIn()
      return
    }
    if (isMod && e.key === '-') {
      e.preventDefault()
      target.zoomOut()
      return
    }
    if (isMod && e.key === '0') {
      e.preventDefault()
      target.resetZoom()
      return
    }

    // ── Pages ─────────────────────────────────
    if (e.key === 'PageDown') {
      e.preventDefault()
      void target.nextPage()
      return
    }
    if (e.key === 'PageUp') {
      e.preventDefault()
      void target.prevPage()
      return
    }

    if (isMod && key === 's') {
      e.preventDefault()
      handlers.onSave()
    }
  }

  document.addEventListener('keydown', handler)
  return () => document.removeEventListener('keydown', handler)
}
