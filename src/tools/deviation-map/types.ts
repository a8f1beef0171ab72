// ── Deviation Map Types ──────────────────────────────────────

export interface Point {
  x: number
  y: number
}

export interface Size {
  width: number
  height: number
}

// ── Deviations (opaque to the engine apart from their count) ─

export interface Deviation {
  id: string
  deviation: string
  causes: string[]
  consequence: string
  safeguards: string[]
  recommendations: string[]
  comments: string
  minimized: boolean
}

// ── Nodes ───────────────────────────────────────────────────

export interface NodeStyle {
  color: string
  strokeWidth: number   // document units
  opacity: number       // 0–1
  hasArrow: boolean
  fontSize: number      // document units
}

export const DEFAULT_NODE_STYLE: NodeStyle = {
  color: '#FF0000',
  strokeWidth: 2,
  opacity: 0.7,
  hasArrow: true,
  fontSize: 12,
}

/** A named, styled polyline scoped to one page. */
export interface MapNode extends NodeStyle {
  id: string
  name: string
  points: Point[]       // document space, path order
  page: number          // 0-based
  deviations: Deviation[]
}

export type NodeProps = Partial<Pick<MapNode, 'name' | 'color' | 'strokeWidth' | 'opacity' | 'hasArrow' | 'fontSize'>>

// ── View ────────────────────────────────────────────────────

export interface ViewState {
  zoomLevel: number
  panX: number
  panY: number
  fitToWindow: boolean
  renderScale: number
  displayScale: number
  page: number
  pageWidth: number
  pageHeight: number
  viewportWidth: number
  viewportHeight: number
}

export const MIN_ZOOM = 0.1
export const MAX_ZOOM = 5

/** Magnification the rasterizer is asked for at zoom 1. */
export const BASE_RENDER_SCALE = 1.5

export const WHEEL_ZOOM_FACTOR = 1.1
export const KEY_ZOOM_FACTOR = 1.2

// Screen-pixel tolerances, converted through the current scale
export const SELECT_TOLERANCE_PX = 25
export const GRAB_TOLERANCE_PX = 15
export const INSERT_TOLERANCE_PX = 25

/** What the host has to redraw after an input. */
export type RenderHint = 'none' | 'overlay' | 'full'

export type NodeDecoration = 'normal' | 'selected' | 'editing'

// ── Utility ─────────────────────────────────────────────────

export function genId(): string {
  return Math.random().toString(36).substring(2, 11)
}

export function emptyDeviation(): Deviation {
  return {
    id: genId(),
    deviation: '',
    causes: [],
    consequence: '',
    safeguards: [],
    recommendations: [],
    comments: '',
    minimized: false,
  }
}
