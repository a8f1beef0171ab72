import type { MapNode, NodeDecoration, Point, RenderHint } from './types.ts'
import { GRAB_TOLERANCE_PX, INSERT_TOLERANCE_PX, SELECT_TOLERANCE_PX } from './types.ts'
import { HitTester } from './hitTest.ts'
import type { NodeStore, NodeStoreState } from './nodeStore.ts'
import type { ViewTransform } from './viewTransform.ts'

// ── States ──────────────────────────────────────────────────

export type SessionState =
  | { kind: 'idle' }
  | { kind: 'creating'; nodeId: string | null }
  | { kind: 'selected'; nodeId: string }
  | { kind: 'pointEditing'; nodeId: string }
  | { kind: 'dragging'; nodeId: string; pointIndex: number; originalPoint: Point; lastScreen: Point }

export type SessionEvents = {
  nodeSelected: MapNode
  nodeDeselected: void
  lineCreationStarted: void
  lineCreationEnded: MapNode | null
}

type Handler<K extends keyof SessionEvents> = (payload: SessionEvents[K]) => void
type ListenerMap = { [K in keyof SessionEvents]: Set<Handler<K>> }

const IDLE: SessionState = { kind: 'idle' }

/**
 * Pointer/keyboard state machine for creating, selecting and reshaping nodes.
 * Holds node ids only; the store owns node lifetime.
 */
export class EditSession {
  private s: SessionState = IDLE
  private hit: HitTester
  private unsubscribe: () => void
  private listeners: ListenerMap = {
    nodeSelected: new Set(),
    nodeDeselected: new Set(),
    lineCreationStarted: new Set(),
    lineCreationEnded: new Set(),
  }

  constructor(private store: NodeStore, private view: ViewTransform) {
    this.hit = new HitTester(view)
    this.unsubscribe = store.subscribe((state) => this.onStoreChange(state))
  }

  get state(): SessionState {
    return this.s
  }

  /** Id of the node shown as selected (selected, editing or dragging). */
  get selectedId(): string | null {
    return this.s.kind === 'creating' || this.s.kind === 'idle' ? null : this.s.nodeId
  }

  get editingId(): string | null {
    return this.s.kind === 'pointEditing' || this.s.kind === 'dragging' ? this.s.nodeId : null
  }

  get isCreating(): boolean {
    return this.s.kind === 'creating'
  }

  decorationFor(nodeId: string): NodeDecoration {
    if (this.editingId === nodeId) return 'editing'
    if (this.s.kind === 'selected' && this.s.nodeId === nodeId) return 'selected'
    return 'normal'
  }

  // ── Observers ───────────────────────────────────────────

  on<K extends keyof SessionEvents>(event: K, handler: Handler<K>): () => void {
    this.listeners[event].add(handler)
    return () => this.off(event, handler)
  }

  off<K extends keyof SessionEvents>(event: K, handler: Handler<K>): void {
    this.listeners[event].delete(handler)
  }

  private emit<K extends keyof SessionEvents>(event: K, payload: SessionEvents[K]): void {
    for (const fn of Array.from(this.listeners[event])) fn(payload)
  }

  dispose(): void {
    this.unsubscribe()
  }

  // ── Inputs ──────────────────────────────────────────────

  startCreate(): RenderHint {
    if (this.s.kind === 'creating') this.finish()
    else if (this.s.kind !== 'idle') this.deselect()
    this.s = { kind: 'creating', nodeId: null }
    this.emit('lineCreationStarted', undefined)
    return 'full'
  }

  click(screen: Point): RenderHint {
    const s = this.s
    const { store } = this

    switch (s.kind) {
      case 'creating': {
        const doc = this.view.toDocument(screen)
        if (s.nodeId === null) {
          const node = store.getState().addNode(this.view.state.page, [doc])
          this.s = { kind: 'creating', nodeId: node.id }
        } else {
          store.getState().appendPoint(s.nodeId, doc)
        }
        return 'full'
      }

      case 'pointEditing': {
        const node = store.getState().getNode(s.nodeId)
        if (!node) return this.toIdle()
        const doc = this.view.toDocument(screen)
        const index = this.hit.findPointNear(doc, node, GRAB_TOLERANCE_PX)
        if (index === null) {
          this.deselect()
          return 'full'
        }
        this.s = {
          kind: 'dragging',
          nodeId: s.nodeId,
          pointIndex: index,
          originalPoint: { ...node.points[index] },
          lastScreen: { ...screen },
        }
        return 'overlay'
      }

      case 'dragging':
        return 'none'

      case 'idle':
      case 'selected': {
        const candidates = store.getState().listForPage(this.view.state.page)
        const node = this.hit.findAnnotationNear(screen, SELECT_TOLERANCE_PX, candidates)
        if (node) {
          const wasSelected = this.s.kind === 'selected' && this.s.nodeId === node.id
          this.s = { kind: 'selected', nodeId: node.id }
          if (!wasSelected) this.emit('nodeSelected', node)
        } else {
          this.deselect()
        }
        return 'full'
      }
    }
  }

  doubleClick(screen: Point): RenderHint {
    if (this.s.kind !== 'idle' && this.s.kind !== 'selected') return 'none'
    const candidates = this.store.getState().listForPage(this.view.state.page)
    const node = this.hit.findAnnotationNear(screen, SELECT_TOLERANCE_PX, candidates)
    if (!node || node.points.length < 2) return 'none'

    const wasSelected = this.s.kind === 'selected' && this.s.nodeId === node.id
    this.s = { kind: 'pointEditing', nodeId: node.id }
    if (!wasSelected) this.emit('nodeSelected', node)
    return 'full'
  }

  /** Moves the grabbed vertex by a screen-space delta at the current scale. */
  dragBy(dx: number, dy: number): RenderHint {
    const s = this.s
    if (s.kind !== 'dragging') return 'none'
    const node = this.store.getState().getNode(s.nodeId)
    if (!node) return this.toIdle()

    const scale = this.view.effectiveScale
    const current = node.points[s.pointIndex]
    this.store.getState().setPoint(s.nodeId, s.pointIndex, {
      x: current.x + dx / scale,
      y: current.y + dy / scale,
    })
    this.s = { ...s, lastScreen: { x: s.lastScreen.x + dx, y: s.lastScreen.y + dy } }
    return 'overlay'
  }

  dragTo(screen: Point): RenderHint {
    if (this.s.kind !== 'dragging') return 'none'
    return this.dragBy(screen.x - this.s.lastScreen.x, screen.y - this.s.lastScreen.y)
  }

  release(): RenderHint {
    if (this.s.kind !== 'dragging') return 'none'
    this.s = { kind: 'pointEditing', nodeId: this.s.nodeId }
    return 'full'
  }

  rightClick(screen: Point): RenderHint {
    const s = this.s
    if (s.kind === 'creating') return this.finish()
    if (s.kind !== 'pointEditing') return 'none'

    const state = this.store.getState()
    const node = state.getNode(s.nodeId)
    if (!node) return this.toIdle()
    const doc = this.view.toDocument(screen)

    const vertex = this.hit.findPointNear(doc, node, GRAB_TOLERANCE_PX)
    if (vertex !== null) {
      return state.removePoint(s.nodeId, vertex) ? 'full' : 'none'
    }

    const at = this.hit.findInsertionIndex(doc, node, INSERT_TOLERANCE_PX)
    if (at === null) return 'none'
    state.insertPoint(s.nodeId, at, doc)
    return 'full'
  }

  /** Ends line creation; a node with fewer than 2 points is discarded. */
  finish(): RenderHint {
    const s = this.s
    if (s.kind !== 'creating') return 'none'
    this.s = IDLE

    let kept: MapNode | null = null
    if (s.nodeId !== null) {
      const state = this.store.getState()
      const node = state.getNode(s.nodeId)
      if (node && node.points.length < 2) state.removeNode(node.id)
      else if (node) kept = node
    }
    this.emit('lineCreationEnded', kept)
    return 'full'
  }

  escape(): RenderHint {
    const s = this.s
    switch (s.kind) {
      case 'idle':
        return 'none'
      case 'creating':
        return this.finish()
      case 'dragging':
        this.store.getState().setPoint(s.nodeId, s.pointIndex, s.originalPoint)
        this.deselect()
        return 'full'
      case 'selected':
      case 'pointEditing':
        this.deselect()
        return 'full'
    }
  }

  deleteSelected(): RenderHint {
    const id = this.selectedId
    if (id === null) return 'none'
    this.deselect()
    this.store.getState().removeNode(id)
    return 'full'
  }

  // ── Internals ───────────────────────────────────────────

  private deselect(): void {
    this.s = IDLE
    this.emit('nodeDeselected', undefined)
  }

  private toIdle(): RenderHint {
    this.deselect()
    return 'full'
  }

  private onStoreChange(state: NodeStoreState): void {
    const s = this.s
    if (s.kind === 'idle' || (s.kind === 'creating' && s.nodeId === null)) return
    const id = s.nodeId
    if (state.nodes.some((n) => n.id === id)) return

    if (s.kind === 'creating') this.s = { kind: 'creating', nodeId: null }
    else this.deselect()
  }
}
