import { describe, it, expect, vi } from 'vitest'
import { EditSession } from '../editSession.ts'
import { createNodeStore } from '../nodeStore.ts'
import { ViewTransform } from '../viewTransform.ts'
import type { MapNode } from '../types.ts'

/** Session over an 800×600 page shown 1:1, so screen and document coincide. */
function setup() {
  const store = createNodeStore()
  const view = new ViewTransform(1)
  view.resetToFit({ width: 800, height: 600 }, { width: 800, height: 600 })
  const session = new EditSession(store, view)
  return { store, view, session }
}

function drawLine(session: EditSession, ...pts: [number, number][]) {
  session.startCreate()
  for (const [x, y] of pts) session.click({ x, y })
  session.finish()
}

function only(nodes: MapNode[]): MapNode {
  expect(nodes).toHaveLength(1)
  return nodes[0]
}

describe('EditSession', () => {
  describe('line creation', () => {
    it('adds the node on the first click and extends it after', () => {
      const { store, session } = setup()
      expect(session.startCreate()).toBe('full')
      expect(session.isCreating).toBe(true)

      session.click({ x: 0, y: 0 })
      expect(only(store.getState().nodes).points).toEqual([{ x: 0, y: 0 }])

      session.click({ x: 100, y: 0 })
      expect(session.finish()).toBe('full')
      expect(session.state.kind).toBe('idle')
      const node = only(store.getState().nodes)
      expect(node.points).toEqual([{ x: 0, y: 0 }, { x: 100, y: 0 }])
      expect(node.name).toBe('Line 1')
    })

    it('discards a line with a single point', () => {
      const { store, session } = setup()
      const ended = vi.fn()
      session.on('lineCreationEnded', ended)

      session.startCreate()
      session.click({ x: 10, y: 10 })
      session.finish()

      expect(store.getState().nodes).toEqual([])
      expect(ended).toHaveBeenCalledWith(null)
    })

    it('keeps a two-point line when escape ends creation', () => {
      const { store, session } = setup()
      session.startCreate()
      session.click({ x: 0, y: 0 })
      session.click({ x: 50, y: 0 })
      session.escape()
      expect(store.getState().nodes[0].points).toHaveLength(2)
      expect(session.state.kind).toBe('idle')
    })

    it('finishes on right click', () => {
      const { store, session } = setup()
      session.startCreate()
      session.click({ x: 0, y: 0 })
      session.click({ x: 0, y: 80 })
      session.rightClick({ x: 300, y: 300 })
      expect(session.isCreating).toBe(false)
      expect(store.getState().nodes).toHaveLength(1)
    })

    it('places new nodes on the current page', () => {
      const { store, view, session } = setup()
      view.setPage(1)
      drawLine(session, [0, 0], [20, 0])
      expect(only(store.getState().nodes).page).toBe(1)
    })

    it('finishes the previous line when a new one starts', () => {
      const { store, session } = setup()
      const ended = vi.fn()
      session.on('lineCreationEnded', ended)
      session.startCreate()
      session.click({ x: 0, y: 0 })
      session.click({ x: 10, y: 0 })
      session.startCreate()
      expect(ended).toHaveBeenCalledTimes(1)
      expect(session.state).toEqual({ kind: 'creating', nodeId: null })
      expect(store.getState().nodes).toHaveLength(1)
    })
  })

  describe('selection', () => {
    it('selects within tolerance and deselects on a miss', () => {
      const { store, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      const id = store.getState().nodes[0].id

      session.click({ x: 50, y: 20 })
      expect(session.selectedId).toBe(id)
      expect(session.decorationFor(id)).toBe('selected')

      session.click({ x: 50, y: 30 })
      expect(session.selectedId).toBeNull()
      expect(session.decorationFor(id)).toBe('normal')
    })

    it('ignores nodes on other pages', () => {
      const { store, view, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      view.setPage(1)
      session.click({ x: 50, y: 0 })
      expect(session.selectedId).toBeNull()
      expect(store.getState().nodes).toHaveLength(1)
    })

    it('notifies observers and supports unsubscribe', () => {
      const { store, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      const selected = vi.fn()
      const deselected = vi.fn()
      const stop = session.on('nodeSelected', selected)
      session.on('nodeDeselected', deselected)

      session.click({ x: 50, y: 0 })
      expect(selected).toHaveBeenCalledWith(store.getState().nodes[0])
      session.escape()
      expect(deselected).toHaveBeenCalledTimes(1)

      stop()
      session.click({ x: 50, y: 0 })
      expect(selected).toHaveBeenCalledTimes(1)
    })

    it('deletes the selected node', () => {
      const { store, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      expect(session.deleteSelected()).toBe('none')
      session.click({ x: 50, y: 0 })
      expect(session.deleteSelected()).toBe('full')
      expect(store.getState().nodes).toEqual([])
      expect(session.state.kind).toBe('idle')
    })

    it('drops the selection when the store loses the node', () => {
      const { store, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      const deselected = vi.fn()
      session.on('nodeDeselected', deselected)
      session.click({ x: 50, y: 0 })

      store.getState().removeNode(store.getState().nodes[0].id)
      expect(session.state.kind).toBe('idle')
      expect(deselected).toHaveBeenCalledTimes(1)
    })

    it('starts a fresh node if the one being created is removed', () => {
      const { store, session } = setup()
      session.startCreate()
      session.click({ x: 0, y: 0 })
      store.getState().clear()
      expect(session.state).toEqual({ kind: 'creating', nodeId: null })

      session.click({ x: 5, y: 5 })
      expect(only(store.getState().nodes).points).toEqual([{ x: 5, y: 5 }])
    })
  })

  describe('point editing', () => {
    function editing() {
      const ctx = setup()
      drawLine(ctx.session, [0, 0], [100, 0])
      const id = ctx.store.getState().nodes[0].id
      expect(ctx.session.doubleClick({ x: 50, y: 0 })).toBe('full')
      return { ...ctx, id }
    }

    it('enters editing on double click', () => {
      const { session, id } = editing()
      expect(session.state).toEqual({ kind: 'pointEditing', nodeId: id })
      expect(session.decorationFor(id)).toBe('editing')
      expect(session.selectedId).toBe(id)
    })

    it('drags a vertex with overlay-only updates', () => {
      const { store, session, id } = editing()
      expect(session.click({ x: 100, y: 0 })).toBe('overlay')
      expect(session.state.kind).toBe('dragging')

      expect(session.dragTo({ x: 110, y: 0 })).toBe('overlay')
      expect(store.getState().getNode(id)?.points[1]).toEqual({ x: 110, y: 0 })

      expect(session.release()).toBe('full')
      expect(session.state).toEqual({ kind: 'pointEditing', nodeId: id })
    })

    it('converts drag deltas at the current scale', () => {
      const { store, view, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      const id = store.getState().nodes[0].id
      view.zoomAt({ x: 0, y: 0 }, 2)

      session.doubleClick({ x: 100, y: 0 })
      session.click({ x: 200, y: 0 })
      session.dragTo({ x: 220, y: 0 })
      expect(store.getState().getNode(id)?.points[1]).toEqual({ x: 110, y: 0 })
    })

    it('restores the vertex when a drag is cancelled', () => {
      const { store, session, id } = editing()
      session.click({ x: 100, y: 0 })
      session.dragTo({ x: 130, y: 20 })
      session.escape()
      expect(store.getState().getNode(id)?.points[1]).toEqual({ x: 100, y: 0 })
      expect(session.state.kind).toBe('idle')
    })

    it('deselects when a click misses every vertex', () => {
      const { session } = editing()
      expect(session.click({ x: 50, y: 0 })).toBe('full')
      expect(session.state.kind).toBe('idle')
    })

    it('refuses to remove a vertex from a two-point line', () => {
      const { store, session, id } = editing()
      expect(session.rightClick({ x: 100, y: 0 })).toBe('none')
      expect(store.getState().getNode(id)?.points).toHaveLength(2)
    })

    it('inserts a vertex near a segment and removes it again', () => {
      const { store, session, id } = editing()
      expect(session.rightClick({ x: 70, y: 3 })).toBe('full')
      expect(store.getState().getNode(id)?.points).toEqual([
        { x: 0, y: 0 },
        { x: 70, y: 3 },
        { x: 100, y: 0 },
      ])

      expect(session.rightClick({ x: 72, y: 3 })).toBe('full')
      expect(store.getState().getNode(id)?.points).toEqual([{ x: 0, y: 0 }, { x: 100, y: 0 }])
    })

    it('ignores a right click far from the line', () => {
      const { session } = editing()
      expect(session.rightClick({ x: 400, y: 400 })).toBe('none')
    })

    it('does not re-announce a node that was already selected', () => {
      const { store, session } = setup()
      drawLine(session, [0, 0], [100, 0])
      const selected = vi.fn()
      session.on('nodeSelected', selected)
      session.click({ x: 50, y: 0 })
      session.click({ x: 60, y: 0 })
      session.doubleClick({ x: 50, y: 0 })
      expect(selected).toHaveBeenCalledTimes(1)
      expect(session.editingId).toBe(store.getState().nodes[0].id)
    })
  })
})
