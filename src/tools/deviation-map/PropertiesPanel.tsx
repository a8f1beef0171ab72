import type { ReactNode } from 'react'
import { useStore } from 'zustand'
import { ChevronDown, ChevronRight, Trash2 } from 'lucide-react'
import type { NodeStore } from './nodeStore.ts'
import type { Deviation, MapNode, NodeProps } from './types.ts'

type ListField = 'causes' | 'safeguards' | 'recommendations'

const LIST_FIELDS: { key: ListField; label: string }[] = [
  { key: 'causes', label: 'Causes' },
  { key: 'safeguards', label: 'Safeguards' },
  { key: 'recommendations', label: 'Recommendations' },
]

const inputClass =
  'w-full px-2 py-1.5 text-xs bg-dark-surface border border-white/[0.1] rounded text-white focus:outline-none focus:border-accent/40'

// ── Component ───────────────────────────────────────────────

export function PropertiesPanel({ store, nodeId }: { store: NodeStore; nodeId: string | null }) {
  const node = useStore(store, (s) => (nodeId ? s.getNode(nodeId) : undefined))

  if (!node) {
    return (
      <div className="w-[260px] flex-shrink-0 border-l border-white/[0.06] bg-dark-elevated p-4">
        <p className="text-[10px] text-white/25 text-center mt-8">
          Select a line to edit its properties
        </p>
      </div>
    )
  }

  const { updateNode, updateDeviation, removeDeviation } = store.getState()
  const update = (props: NodeProps) => updateNode(node.id, props)

  return (
    <div className="w-[260px] flex-shrink-0 border-l border-white/[0.06] bg-dark-elevated overflow-y-auto">
      <div className="px-3 py-2 text-[10px] font-semibold text-white/30 uppercase tracking-wider border-b border-white/[0.06]">
        Properties
      </div>

      <div className="p-3 space-y-4">
        <NodeProperties node={node} update={update} />

        <PropSection label={`Deviations (${node.deviations.length})`}>
          {node.deviations.length === 0 && (
            <p className="text-[10px] text-white/25">None yet. Use Add Deviation in the toolbar.</p>
          )}
          <div className="space-y-2">
            {node.deviations.map((d, i) => (
              <DeviationCard
                key={d.id}
                index={i}
                deviation={d}
                onChange={(patch) => updateDeviation(node.id, d.id, patch)}
                onRemove={() => removeDeviation(node.id, d.id)}
              />
            ))}
          </div>
        </PropSection>
      </div>
    </div>
  )
}

// ── Node style ──────────────────────────────────────────────

function NodeProperties({ node, update }: { node: MapNode; update: (props: NodeProps) => void }) {
  return (
    <>
      <PropSection label="Name">
        <input
          type="text"
          aria-label="Name"
          value={node.name}
          onChange={(e) => update({ name: e.target.value })}
          className={inputClass}
        />
      </PropSection>

      <PropSection label="Color">
        <input
          type="color"
          aria-label="Color"
          value={node.color}
          onChange={(e) => update({ color: e.target.value })}
          className="h-7 w-full cursor-pointer rounded border border-white/[0.1] bg-transparent"
        />
      </PropSection>

      <RangeField
        label="Thickness"
        value={node.strokeWidth}
        min={1}
        max={10}
        step={1}
        format={(v) => `${v}`}
        onChange={(strokeWidth) => update({ strokeWidth })}
      />
      <RangeField
        label="Transparency"
        value={node.opacity}
        min={0}
        max={1}
        step={0.05}
        format={(v) => v.toFixed(2)}
        onChange={(opacity) => update({ opacity })}
      />
      <RangeField
        label="Font Size"
        value={node.fontSize}
        min={8}
        max={24}
        step={1}
        format={(v) => `${v}`}
        onChange={(fontSize) => update({ fontSize })}
      />

      <label className="flex items-center gap-2 text-xs text-white/70">
        <input
          type="checkbox"
          checked={node.hasArrow}
          onChange={(e) => update({ hasArrow: e.target.checked })}
        />
        Show Arrow
      </label>
    </>
  )
}

function RangeField({ label, value, min, max, step, format, onChange }: {
  label: string
  value: number
  min: number
  max: number
  step: number
  format: (v: number) => string
  onChange: (v: number) => void
}) {
  return (
    <PropSection label={label}>
      <div className="flex items-center gap-2">
        <input
          type="range"
          aria-label={label}
          value={value}
          min={min}
          max={max}
          step={step}
          onChange={(e) => onChange(Number(e.target.value))}
          className="flex-1 accent-accent"
        />
        <span className="w-8 text-right text-[10px] text-white/50">{format(value)}</span>
      </div>
    </PropSection>
  )
}

// ── Deviations ──────────────────────────────────────────────

function DeviationCard({ index, deviation, onChange, onRemove }: {
  index: number
  deviation: Deviation
  onChange: (patch: Partial<Omit<Deviation, 'id'>>) => void
  onRemove: () => void
}) {
  const title = deviation.deviation || `Deviation ${index + 1}`
  const Chevron = deviation.minimized ? ChevronRight : ChevronDown

  return (
    <div className="rounded border border-white/[0.08] bg-dark-surface/60">
      <div className="flex items-center gap-1 px-2 py-1.5">
        <button
          onClick={() => onChange({ minimized: !deviation.minimized })}
          aria-label={deviation.minimized ? `Expand ${title}` : `Collapse ${title}`}
          className="text-white/40 hover:text-white"
        >
          <Chevron size={12} />
        </button>
        <span className="flex-1 truncate text-xs text-white/80">{title}</span>
        <button
          onClick={onRemove}
          aria-label={`Remove ${title}`}
          className="text-white/30 hover:text-red-400 transition-colors"
        >
          <Trash2 size={12} />
        </button>
      </div>

      {!deviation.minimized && (
        <div className="space-y-2 px-2 pb-2">
          <input
            type="text"
            aria-label="Deviation"
            placeholder="Deviation"
            value={deviation.deviation}
            onChange={(e) => onChange({ deviation: e.target.value })}
            className={inputClass}
          />
          <input
            type="text"
            aria-label="Consequence"
            placeholder="Consequence"
            value={deviation.consequence}
            onChange={(e) => onChange({ consequence: e.target.value })}
            className={inputClass}
          />
          {/* One entry per line */}
          {LIST_FIELDS.map(({ key, label }) => (
            <textarea
              key={key}
              aria-label={label}
              placeholder={label}
              rows={2}
              value={deviation[key].join('\n')}
              onChange={(e) => onChange(listPatch(key, e.target.value))}
              className={`${inputClass} resize-y`}
            />
          ))}
          <textarea
            aria-label="Comments"
            placeholder="Comments"
            rows={2}
            value={deviation.comments}
            onChange={(e) => onChange({ comments: e.target.value })}
            className={`${inputClass} resize-y`}
          />
        </div>
      )}
    </div>
  )
}

function listPatch(key: ListField, text: string): Partial<Omit<Deviation, 'id'>> {
  const patch: Partial<Omit<Deviation, 'id'>> = {}
  patch[key] = text.split('\n')
  return patch
}

// ── Shared ──────────────────────────────────────────────────

function PropSection({ label, children }: { label: string; children: ReactNode }) {
  return (
    <div>
      <div className="text-[10px] font-medium text-white/40 uppercase tracking-wider mb-1.5">{label}</div>
      {children}
    </div>
  )
}
