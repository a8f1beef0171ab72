import { useState } from 'react'
import { Keyboard } from 'lucide-react'

const SHORTCUTS: [string, string][] = [
  ['Ctrl+L', 'Start a new line'],
  ['Click', 'Add a point / select a line'],
  ['Enter or right-click', 'Finish the line'],
  ['Double-click', 'Edit the points of a line'],
  ['Right-click (editing)', 'Remove a point, or insert one on a segment'],
  ['Delete', 'Delete the selected line'],
  ['Esc', 'Cancel / leave editing'],
  ['Ctrl+wheel, Ctrl+= / Ctrl+-', 'Zoom'],
  ['Ctrl+0', 'Fit page to window'],
  ['PgUp / PgDn', 'Previous / next page'],
  ['Ctrl+S', 'Save analysis'],
]

export function Header() {
  const [helpOpen, setHelpOpen] = useState(false)

  return (
    <header className="h-14 flex items-center px-6 border-b border-white/[0.06] bg-black/10 relative">
      <div className="flex-1 min-w-0">
        <h1 className="text-base font-display font-semibold text-white">Deviation Mapper</h1>
        <p className="text-xs text-white/50 -mt-0.5">Mark lines on a drawing and record their deviations</p>
      </div>

      <button
        onClick={() => setHelpOpen((o) => !o)}
        className="w-7 h-7 flex items-center justify-center rounded-full text-white/30 hover:text-white/60 hover:bg-white/[0.06] transition-colors"
        title="Keyboard shortcuts"
        aria-label="Keyboard shortcuts"
      >
        <Keyboard size={16} />
      </button>

      {helpOpen && (
        <div className="absolute top-full right-4 mt-1 z-50 w-[320px] bg-dark-surface border border-white/[0.1] rounded-lg shadow-xl p-3">
          <dl className="grid grid-cols-[auto_1fr] gap-x-3 gap-y-1 text-[11px]">
            {SHORTCUTS.map(([keys, action]) => (
              <div key={keys} className="contents">
                <dt className="text-white/70 font-medium">{keys}</dt>
                <dd className="text-white/40">{action}</dd>
              </div>
            ))}
          </dl>
        </div>
      )}
    </header>
  )
}
