import type { ReactNode } from 'react'
import {
  PenLine, Check, X, ZoomIn, ZoomOut, Maximize2, ChevronLeft, ChevronRight,
  MessageSquarePlus, Trash2, Save, FolderOpen, Image as ImageIcon, FileDown,
} from 'lucide-react'

export interface ToolbarActions {
  startLine: () => void
  finishLine: () => void
  cancel: () => void
  zoomIn: () => void
  zoomOut: () => void
  resetZoom: () => void
  prevPage: () => void
  nextPage: () => void
  addDeviation: () => void
  deleteSelected: () => void
  save: () => void
  load: () => void
  exportPng: () => void
  exportPdf: () => void
}

export interface ToolbarProps {
  page: number          // 0-based
  pageCount: number
  zoomPercent: number
  creating: boolean
  selectedName: string | null
  deviationCount: number
  busy: boolean
  actions: ToolbarActions
}

// ── Component ───────────────────────────────────────────────

export function Toolbar({
  page, pageCount, zoomPercent, creating, selectedName, deviationCount, busy, actions,
}: ToolbarProps) {
  return (
    <div className="flex items-center gap-1 px-2 py-1.5 bg-dark-elevated border-b border-white/[0.06] flex-shrink-0 overflow-x-auto">
      {/* ── Line creation ─────────────────────── */}
      <ToolbarGroup>
        {creating ? (
          <>
            <ToolbarButton icon={Check} label="Finish Line (Enter)" active onClick={actions.finishLine} />
            <ToolbarButton icon={X} label="Cancel (Esc)" onClick={actions.cancel} />
          </>
        ) : (
          <ToolbarButton icon={PenLine} label="New Line (Ctrl+L)" onClick={actions.startLine} />
        )}
      </ToolbarGroup>

      <ToolbarDivider />

      {/* ── Pages ─────────────────────────────── */}
      <ToolbarGroup>
        <ToolbarButton icon={ChevronLeft} label="Previous Page (PgUp)" disabled={page <= 0} onClick={actions.prevPage} />
        <span className="text-[10px] text-white/40 min-w-[52px] text-center tabular-nums">
          {pageCount > 0 ? `${page + 1} / ${pageCount}` : '–'}
        </span>
        <ToolbarButton icon={ChevronRight} label="Next Page (PgDn)" disabled={page >= pageCount - 1} onClick={actions.nextPage} />
      </ToolbarGroup>

      <ToolbarDivider />

      {/* ── Zoom ──────────────────────────────── */}
      <ToolbarGroup>
        <ToolbarButton icon={ZoomOut} label="Zoom Out (Ctrl+-)" onClick={actions.zoomOut} />
        <span className="text-[10px] text-white/40 min-w-[36px] text-center tabular-nums">
          {zoomPercent}%
        </span>
        <ToolbarButton icon={ZoomIn} label="Zoom In (Ctrl+=)" onClick={actions.zoomIn} />
        <ToolbarButton icon={Maximize2} label="Fit to Window (Ctrl+0)" onClick={actions.resetZoom} />
      </ToolbarGroup>

      <ToolbarDivider />

      {/* ── Selection ─────────────────────────── */}
      <ToolbarGroup>
        <span className="text-[11px] text-white/60 px-1 max-w-[160px] truncate">
          {selectedName ? `${selectedName} · ${deviationCount} deviation${deviationCount === 1 ? '' : 's'}` : 'No line selected'}
        </span>
        <ToolbarButton icon={MessageSquarePlus} label="Add Deviation" disabled={!selectedName} onClick={actions.addDeviation} />
        <ToolbarButton icon={Trash2} label="Delete Line (Del)" disabled={!selectedName} onClick={actions.deleteSelected} danger />
      </ToolbarGroup>

      <div className="flex-1" />

      {/* ── File ──────────────────────────────── */}
      <ToolbarGroup>
        <ToolbarButton icon={FolderOpen} label="Load Analysis" disabled={busy} onClick={actions.load} />
        <ToolbarButton icon={Save} label="Save Analysis (Ctrl+S)" disabled={busy} onClick={actions.save} />
        <ToolbarButton icon={ImageIcon} label="Export Page as PNG" disabled={busy} onClick={actions.exportPng} />
        <ToolbarButton icon={FileDown} label="Export Page as PDF" disabled={busy} onClick={actions.exportPdf} />
      </ToolbarGroup>
    </div>
  )
}

// ── Sub-components ──────────────────────────────────────────

function ToolbarGroup({ children }: { children: ReactNode }) {
  return <div className="flex items-center gap-0.5">{children}</div>
}

function ToolbarDivider() {
  return <div className="w-px h-5 bg-white/[0.08] mx-1" />
}

function ToolbarButton({
  icon: Icon,
  label,
  active = false,
  disabled = false,
  danger = false,
  onClick,
}: {
  icon: typeof PenLine
  label: string
  active?: boolean
  disabled?: boolean
  danger?: boolean
  onClick: () => void
}) {
  return (
    <button
      title={label}
      aria-label={label}
      disabled={disabled}
      onClick={onClick}
      className={`
        p-1.5 rounded transition-colors
        ${disabled ? 'opacity-30 cursor-not-allowed' : ''}
        ${active
          ? 'bg-accent/20 text-accent'
          : danger
            ? 'text-red-400/70 hover:text-red-400 hover:bg-red-500/10'
            : 'text-white/50 hover:text-white hover:bg-white/[0.06]'
        }
      `}
    >
      <Icon size={15} />
    </button>
  )
}
