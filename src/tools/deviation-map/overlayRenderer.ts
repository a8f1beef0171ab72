import type { MapNode, NodeDecoration, Point } from './types.ts'
import {
  longestSegment, perpendicular, pointAtArcLength, polylineArcLength, segmentAngle, unitVector,
} from './geometry.ts'

/** The slice of CanvasRenderingContext2D the overlay draws through. */
export interface OverlayContext {
  globalAlpha: number
  strokeStyle: string | CanvasGradient | CanvasPattern
  fillStyle: string | CanvasGradient | CanvasPattern
  lineWidth: number
  lineCap: CanvasLineCap
  lineJoin: CanvasLineJoin
  font: string
  textAlign: CanvasTextAlign
  textBaseline: CanvasTextBaseline
  save(): void
  restore(): void
  clearRect(x: number, y: number, w: number, h: number): void
  beginPath(): void
  moveTo(x: number, y: number): void
  lineTo(x: number, y: number): void
  stroke(): void
  fill(): void
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void
  fillRect(x: number, y: number, w: number, h: number): void
  strokeRect(x: number, y: number, w: number, h: number): void
  setLineDash(segments: number[]): void
  translate(x: number, y: number): void
  rotate(angle: number): void
  fillText(text: string, x: number, y: number): void
  measureText(text: string): { width: number }
}

export interface OverlayFrame {
  nodes: readonly MapNode[]
  /** Raster pixels per document unit. */
  scale: number
  width: number
  height: number
  decorationFor: (nodeId: string) => NodeDecoration
}

// ── Style constants (raster px at scale 1) ──────────────────

export const DASH = [10, 5]
export const DOT_DASH = [3, 4, 8, 4]
export const VERTEX_SIZE = 8
export const INDICATOR_RADIUS = 8
export const LABEL_PADDING = 2
export const LABEL_BACKGROUND = 'rgba(255,255,255,0.78)'
const OUTLINE = '#FFFFFF'

export function strokeWidthFor(node: MapNode, scale: number, decoration: NodeDecoration): number {
  const w = node.strokeWidth
  if (decoration === 'normal') return w * scale
  return Math.max((w + 3) * scale, w * 2 * scale)
}

export function dashFor(decoration: NodeDecoration, scale: number): number[] {
  if (decoration === 'selected') return DASH.map((d) => d * scale)
  if (decoration === 'editing') return DOT_DASH.map((d) => d * scale)
  return []
}

// ── Entry point ─────────────────────────────────────────────

/** Clears the layer and draws every node with at least two points. */
export function renderOverlay(ctx: OverlayContext, frame: OverlayFrame): void {
  ctx.clearRect(0, 0, frame.width, frame.height)
  for (const node of frame.nodes) {
    if (node.points.length < 2) continue
    drawNode(ctx, node, frame.scale, frame.decorationFor(node.id))
  }
}

export function drawNode(ctx: OverlayContext, node: MapNode, scale: number, decoration: NodeDecoration): void {
  const pts = node.points.map((p) => ({ x: p.x * scale, y: p.y * scale }))
  const lineWidth = strokeWidthFor(node, scale, decoration)

  ctx.save()
  ctx.globalAlpha = node.opacity
  ctx.strokeStyle = node.color
  ctx.lineWidth = lineWidth
  ctx.lineJoin = 'round'
  ctx.lineCap = decoration === 'normal' ? 'round' : 'butt'
  ctx.setLineDash(dashFor(decoration, scale))

  ctx.beginPath()
  ctx.moveTo(pts[0].x, pts[0].y)
  for (let i = 1; i < pts.length; i++) ctx.lineTo(pts[i].x, pts[i].y)
  ctx.stroke()

  if (node.hasArrow) {
    ctx.setLineDash([])
    drawArrowhead(ctx, pts[pts.length - 2], pts[pts.length - 1], lineWidth)
  }
  ctx.restore()

  if (decoration === 'editing') drawVertexMarkers(ctx, pts, node.color, scale)
  if (node.name) drawLabel(ctx, node, pts, scale)
  if (node.deviations.length > 0) drawIndicators(ctx, node, pts, scale)
}

// ── Decorations ─────────────────────────────────────────────

export function drawArrowhead(ctx: OverlayContext, from: Point, to: Point, lineWidth: number): void {
  if (from.x === to.x && from.y === to.y) return
  const angle = Math.atan2(to.y - from.y, to.x - from.x)
  const size = Math.max(10, lineWidth * 3)
  for (const side of [-1, 1]) {
    const a = angle + (side * Math.PI) / 6
    ctx.beginPath()
    ctx.moveTo(to.x, to.y)
    ctx.lineTo(to.x - size * Math.cos(a), to.y - size * Math.sin(a))
    ctx.stroke()
  }
}

function drawVertexMarkers(ctx: OverlayContext, pts: Point[], color: string, scale: number): void {
  const size = Math.max(VERTEX_SIZE, VERTEX_SIZE * scale)
  const half = size / 2
  ctx.save()
  ctx.setLineDash([])
  ctx.fillStyle = color
  ctx.strokeStyle = OUTLINE
  ctx.lineWidth = 2
  for (const p of pts) {
    ctx.fillRect(p.x - half, p.y - half, size, size)
    ctx.strokeRect(p.x - half, p.y - half, size, size)
  }
  ctx.restore()
}

/** Name on a light chip at the longest segment's midpoint; near-vertical segments get vertical text. */
function drawLabel(ctx: OverlayContext, node: MapNode, pts: Point[], scale: number): void {
  const seg = longestSegment(pts)
  if (!seg) return
  const [a, b] = seg
  const mid = { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 }
  const angle = Math.abs(segmentAngle(a, b))
  const fontPx = node.fontSize * scale

  ctx.save()
  ctx.font = `${fontPx}px sans-serif`
  ctx.textAlign = 'center'
  ctx.textBaseline = 'middle'
  const w = ctx.measureText(node.name).width + LABEL_PADDING * 2
  const h = fontPx + LABEL_PADDING * 2

  ctx.translate(mid.x, mid.y)
  if (angle > 45 && angle < 135) ctx.rotate(-Math.PI / 2)
  ctx.fillStyle = LABEL_BACKGROUND
  ctx.fillRect(-w / 2, -h / 2, w, h)
  ctx.fillStyle = node.color
  ctx.fillText(node.name, 0, 0)
  ctx.restore()
}

/** Centre positions of the deviation-count circles, in raster pixels. */
export function indicatorCenters(pts: Point[], count: number, scale: number): Point[] {
  if (count === 0 || pts.length < 2) return []
  const total = polylineArcLength(pts)
  if (total === 0) return []

  const { point: center, tangent } = pointAtArcLength(pts, total / 2)
  const dir = tangent.x === 0 && tangent.y === 0 ? unitVector(pts[0], pts[1]) : tangent
  const perp = perpendicular(dir)
  const radius = INDICATOR_RADIUS * scale
  const spacing = radius * 2.5
  const start = -((count - 1) * spacing) / 2

  const out: Point[] = []
  for (let i = 0; i < count; i++) {
    const along = start + i * spacing
    out.push({
      x: center.x + along * dir.x + perp.x * (radius + 2),
      y: center.y + along * dir.y + perp.y * (radius + 2),
    })
  }
  return out
}

function drawIndicators(ctx: OverlayContext, node: MapNode, pts: Point[], scale: number): void {
  const radius = INDICATOR_RADIUS * scale
  ctx.save()
  ctx.setLineDash([])
  ctx.fillStyle = node.color
  ctx.strokeStyle = OUTLINE
  ctx.lineWidth = 2
  for (const c of indicatorCenters(pts, node.deviations.length, scale)) {
    ctx.beginPath()
    ctx.arc(c.x, c.y, radius, 0, Math.PI * 2)
    ctx.fill()
    ctx.stroke()
  }
  ctx.restore()
}
