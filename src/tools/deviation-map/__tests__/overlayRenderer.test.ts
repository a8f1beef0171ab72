import { describe, it, expect } from 'vitest'
import {
  DASH, LABEL_BACKGROUND, dashFor, indicatorCenters, renderOverlay, strokeWidthFor,
} from '../overlayRenderer.ts'
import type { OverlayFrame } from '../overlayRenderer.ts'
import { DEFAULT_NODE_STYLE, emptyDeviation } from '../types.ts'
import type { MapNode, NodeDecoration, Point } from '../types.ts'
import { RecordingContext } from './recordingContext.ts'

function node(points: Point[], extra: Partial<MapNode> = {}): MapNode {
  return {
    ...DEFAULT_NODE_STYLE,
    id: 'n1',
    name: '',
    page: 0,
    deviations: [],
    hasArrow: false,
    points,
    ...extra,
  }
}

function frame(nodes: MapNode[], scale = 1, decoration: NodeDecoration = 'normal'): OverlayFrame {
  return { nodes, scale, width: 400, height: 300, decorationFor: () => decoration }
}

const straight = [{ x: 0, y: 0 }, { x: 100, y: 0 }]

describe('renderOverlay', () => {
  it('clears the layer and strokes the polyline in raster space', () => {
    const ctx = new RecordingContext()
    renderOverlay(ctx, frame([node(straight)], 2))

    expect(ctx.calls[0]).toMatchObject({ op: 'clearRect', args: [0, 0, 400, 300] })
    expect(ctx.ops('moveTo')[0].args).toEqual([0, 0])
    expect(ctx.ops('lineTo')[0].args).toEqual([200, 0])

    const [stroke] = ctx.ops('stroke')
    expect(stroke.state.lineWidth).toBe(4)
    expect(stroke.state.dash).toEqual([])
    expect(stroke.state.lineCap).toBe('round')
    expect(stroke.state.globalAlpha).toBe(0.7)
    expect(stroke.state.strokeStyle).toBe('#FF0000')
  })

  it('skips nodes with fewer than two points', () => {
    const ctx = new RecordingContext()
    renderOverlay(ctx, frame([node([{ x: 5, y: 5 }])]))
    expect(ctx.ops('stroke')).toEqual([])
    expect(ctx.ops('clearRect')).toHaveLength(1)
  })

  it('dashes and thickens a selected node', () => {
    const ctx = new RecordingContext()
    renderOverlay(ctx, frame([node(straight)], 1, 'selected'))
    const [stroke] = ctx.ops('stroke')
    expect(stroke.state.lineWidth).toBe(5)
    expect(stroke.state.dash).toEqual(DASH)
    expect(stroke.state.lineCap).toBe('butt')
  })

  it('draws vertex markers with a dot-dash line while editing', () => {
    const ctx = new RecordingContext()
    renderOverlay(ctx, frame([node(straight)], 1.5, 'editing'))

    const [stroke] = ctx.ops('stroke')
    expect(stroke.state.lineWidth).toBe(7.5)
    expect(stroke.state.dash).toEqual([4.5, 6, 12, 6])

    expect(ctx.ops('fillRect').map((c) => c.args)).toEqual([
      [-6, -6, 12, 12],
      [144, -6, 12, 12],
    ])
    const [marker] = ctx.ops('strokeRect')
    expect(marker.state.strokeStyle).toBe('#FFFFFF')
    expect(marker.state.fillStyle).toBe('#FF0000')
    expect(marker.state.dash).toEqual([])
  })

  it('draws a solid two-stroke arrowhead at the last point', () => {
    const ctx = new RecordingContext()
    renderOverlay(ctx, frame([node(straight, { hasArrow: true })], 1, 'selected'))

    const strokes = ctx.ops('stroke')
    expect(strokes).toHaveLength(3)
    expect(strokes[1].state.dash).toEqual([])

    const heads = ctx.ops('lineTo').slice(1)
    expect(heads).toHaveLength(2)
    // size is max(10, 5 * 3) = 15 at ±30°
    expect(heads[0].args[0]).toBeCloseTo(100 - 15 * Math.cos(Math.PI / 6))
    expect(heads[0].args[1]).toBeCloseTo(7.5)
    expect(heads[1].args[0]).toBeCloseTo(100 - 15 * Math.cos(Math.PI / 6))
    expect(heads[1].args[1]).toBeCloseTo(-7.5)
    expect(ctx.ops('moveTo').slice(1).map((c) => c.args)).toEqual([[100, 0], [100, 0]])
  })

  describe('labels', () => {
    it('centres the name on a chip at the longest segment midpoint', () => {
      const ctx = new RecordingContext()
      renderOverlay(ctx, frame([node(straight, { name: 'Line 1' })]))

      expect(ctx.ops('translate')[0].args).toEqual([50, 0])
      expect(ctx.ops('rotate')).toEqual([])

      const [chip] = ctx.ops('fillRect')
      expect(chip.args).toEqual([-20, -8, 40, 16])
      expect(chip.state.fillStyle).toBe(LABEL_BACKGROUND)

      const [text] = ctx.ops('fillText')
      expect(text.args).toEqual(['Line 1', 0, 0])
      expect(text.state.fillStyle).toBe('#FF0000')
      expect(text.state.font).toBe('12px sans-serif')
      expect(text.state.textAlign).toBe('center')
    })

    it('turns the label for near-vertical segments', () => {
      const ctx = new RecordingContext()
      renderOverlay(ctx, frame([node([{ x: 0, y: 0 }, { x: 0, y: 100 }], { name: 'Feed' })]))
      expect(ctx.ops('translate')[0].args).toEqual([0, 50])
      expect(ctx.ops('rotate').map((c) => c.args)).toEqual([[-Math.PI / 2]])
    })

    it('rotates only between 45 and 135 degrees either way', () => {
      const shallow = new RecordingContext()
      renderOverlay(shallow, frame([node([{ x: 0, y: 0 }, { x: 100, y: 60 }], { name: 'Vent' })]))
      expect(shallow.ops('rotate')).toEqual([])

      const steep = new RecordingContext()
      renderOverlay(steep, frame([node([{ x: 0, y: 0 }, { x: 60, y: -100 }], { name: 'Vent' })]))
      expect(steep.ops('rotate')).toHaveLength(1)
    })
  })

  it('draws one circle per deviation', () => {
    const ctx = new RecordingContext()
    const deviations = [emptyDeviation(), emptyDeviation(), emptyDeviation()]
    renderOverlay(ctx, frame([node(straight, { deviations })]))

    const arcs = ctx.ops('arc')
    expect(arcs).toHaveLength(3)
    expect(arcs.map((c) => c.args[0])).toEqual([30, 50, 70])
    expect(arcs.map((c) => c.args[1])).toEqual([10, 10, 10])
    expect(arcs[0].args[2]).toBe(8)
    expect(arcs[0].state.fillStyle).toBe('#FF0000')
    expect(ctx.ops('fill')).toHaveLength(3)
  })
})

describe('indicatorCenters', () => {
  it('spreads circles along the tangent at the arc-length midpoint', () => {
    const centers = indicatorCenters([{ x: 0, y: 0 }, { x: 0, y: 100 }], 2, 1)
    // tangent (0, 1), perpendicular (-1, 0), offset 10, spacing 20
    expect(centers).toHaveLength(2)
    expect(centers[0].x).toBeCloseTo(-10)
    expect(centers[0].y).toBeCloseTo(40)
    expect(centers[1].x).toBeCloseTo(-10)
    expect(centers[1].y).toBeCloseTo(60)
  })

  it('scales radius and spacing', () => {
    const centers = indicatorCenters([{ x: 0, y: 0 }, { x: 200, y: 0 }], 1, 2)
    expect(centers[0].x).toBeCloseTo(100)
    expect(centers[0].y).toBeCloseTo(18)
  })

  it('returns nothing for an empty count or a zero-length path', () => {
    expect(indicatorCenters(straight, 0, 1)).toEqual([])
    expect(indicatorCenters([{ x: 4, y: 4 }, { x: 4, y: 4 }], 2, 1)).toEqual([])
  })
})

describe('decoration styles', () => {
  const n = node(straight)

  it('widens selected and editing strokes', () => {
    expect(strokeWidthFor(n, 1, 'normal')).toBe(2)
    expect(strokeWidthFor(n, 1, 'selected')).toBe(5)
    expect(strokeWidthFor({ ...n, strokeWidth: 6 }, 1, 'editing')).toBe(12)
  })

  it('scales dash patterns', () => {
    expect(dashFor('selected', 2)).toEqual([20, 10])
    expect(dashFor('normal', 2)).toEqual([])
  })
})
