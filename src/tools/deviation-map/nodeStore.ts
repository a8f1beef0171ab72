import { createStore } from 'zustand/vanilla'
import type { Deviation, MapNode, NodeProps, Point } from './types.ts'
import { DEFAULT_NODE_STYLE, genId } from './types.ts'

export interface NodeStoreState {
  documentPath: string | null
  nodes: MapNode[]

  // ── Node lifecycle ──
  addNode: (page: number, points?: Point[], props?: NodeProps) => MapNode
  removeNode: (id: string) => void
  updateNode: (id: string, props: NodeProps) => void
  getNode: (id: string) => MapNode | undefined
  listForPage: (page: number) => MapNode[]

  // ── Points ──
  appendPoint: (id: string, p: Point) => void
  setPoint: (id: string, index: number, p: Point) => void
  insertPoint: (id: string, index: number, p: Point) => void
  /** False when the node is missing or would drop below 2 points. */
  removePoint: (id: string, index: number) => boolean

  // ── Deviations ──
  addDeviation: (id: string, deviation: Deviation) => void
  updateDeviation: (id: string, deviationId: string, patch: Partial<Omit<Deviation, 'id'>>) => void
  removeDeviation: (id: string, deviationId: string) => void

  // ── Whole document ──
  load: (documentPath: string | null, nodes: MapNode[]) => void
  clear: () => void
  setDocumentPath: (path: string | null) => void
}

export type NodeStore = ReturnType<typeof createNodeStore>

export function createNodeStore() {
  return createStore<NodeStoreState>()((set, get) => {
    const patchNode = (id: string, fn: (n: MapNode) => MapNode) =>
      set((s) => ({ nodes: s.nodes.map((n) => (n.id === id ? fn(n) : n)) }))

    return {
      documentPath: null,
      nodes: [],

      addNode: (page, points = [], props = {}) => {
        const node: MapNode = {
          id: genId(),
          name: `Line ${get().nodes.length + 1}`,
          ...DEFAULT_NODE_STYLE,
          ...props,
          points: points.map((p) => ({ ...p })),
          page,
          deviations: [],
        }
        set((s) => ({ nodes: [...s.nodes, node] }))
        return node
      },

      removeNode: (id) => set((s) => ({ nodes: s.nodes.filter((n) => n.id !== id) })),

      updateNode: (id, props) => patchNode(id, (n) => ({ ...n, ...props })),

      getNode: (id) => get().nodes.find((n) => n.id === id),

      listForPage: (page) => get().nodes.filter((n) => n.page === page),

      appendPoint: (id, p) => patchNode(id, (n) => ({ ...n, points: [...n.points, { ...p }] })),

      setPoint: (id, index, p) =>
        patchNode(id, (n) => {
          if (index < 0 || index >= n.points.length) return n
          const points = n.points.slice()
          points[index] = { ...p }
          return { ...n, points }
        }),

      insertPoint: (id, index, p) =>
        patchNode(id, (n) => {
          const points = n.points.slice()
          points.splice(Math.max(0, Math.min(index, points.length)), 0, { ...p })
          return { ...n, points }
        }),

      removePoint: (id, index) => {
        const node = get().getNode(id)
        if (!node || node.points.length <= 2 || index < 0 || index >= node.points.length) return false
        patchNode(id, (n) => ({ ...n, points: n.points.filter((_, i) => i !== index) }))
        return true
      },

      addDeviation: (id, deviation) =>
        patchNode(id, (n) => ({ ...n, deviations: [...n.deviations, deviation] })),

      updateDeviation: (id, deviationId, patch) =>
        patchNode(id, (n) => ({
          ...n,
          deviations: n.deviations.map((d) => (d.id === deviationId ? { ...d, ...patch } : d)),
        })),

      removeDeviation: (id, deviationId) =>
        patchNode(id, (n) => ({ ...n, deviations: n.deviations.filter((d) => d.id !== deviationId) })),

      load: (documentPath, nodes) => set({ documentPath, nodes }),

      clear: () => set({ documentPath: null, nodes: [] }),

      setDocumentPath: (path) => set({ documentPath: path }),
    }
  })
}
