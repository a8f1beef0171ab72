import type { Point } from './types.ts'

// ── Distances ───────────────────────────────────────────────

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}

/** Distance from p to the segment [a, b]; falls back to |p - a| when a == b. */
export function distancePointToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x, dy = b.y - a.y
  const lenSq = dx * dx + dy * dy
  if (lenSq === 0) return Math.hypot(p.x - a.x, p.y - a.y)
  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lenSq))
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy))
}

// ── Arc length ──────────────────────────────────────────────

export function polylineArcLength(points: Point[]): number {
  let total = 0
  for (let i = 0; i < points.length - 1; i++) total += distance(points[i], points[i + 1])
  return total
}

export interface PathSample {
  point: Point
  tangent: Point  // unit vector, or (0, 0) on a degenerate path
}

const ZERO: Point = { x: 0, y: 0 }

/**
 * Point at arc-length offset t from the first vertex, with the unit tangent of
 * the segment it lies on. Offsets past either end clamp to the end points.
 */
export function pointAtArcLength(points: Point[], t: number): PathSample {
  if (points.length === 0) return { point: ZERO, tangent: ZERO }
  const first = points[0]
  if (points.length < 2 || polylineArcLength(points) === 0) {
    return { point: { ...first }, tangent: ZERO }
  }

  let walked = 0
  for (let i = 0; i < points.length - 1; i++) {
    const a = points[i], b = points[i + 1]
    const len = distance(a, b)
    if (walked + len >= t) {
      if (len === 0) return { point: { ...a }, tangent: ZERO }
      const u = Math.max(0, (t - walked) / len)
      return {
        point: { x: a.x + u * (b.x - a.x), y: a.y + u * (b.y - a.y) },
        tangent: { x: (b.x - a.x) / len, y: (b.y - a.y) / len },
      }
    }
    walked += len
  }

  // t beyond the end: last point, tangent of the last non-degenerate segment
  const last = points[points.length - 1]
  for (let i = points.length - 1; i > 0; i--) {
    const len = distance(points[i - 1], points[i])
    if (len > 0) {
      return {
        point: { ...last },
        tangent: { x: (points[i].x - points[i - 1].x) / len, y: (points[i].y - points[i - 1].y) / len },
      }
    }
  }
  return { point: { ...last }, tangent: ZERO }
}

// ── Directions ──────────────────────────────────────────────

/** Rotate a unit vector by +90°. */
export function perpendicular(v: Point): Point {
  return { x: -v.y, y: v.x }
}

export function unitVector(a: Point, b: Point): Point {
  const len = distance(a, b)
  if (len === 0) return ZERO
  return { x: (b.x - a.x) / len, y: (b.y - a.y) / len }
}

/** Angle of a → b from the +x axis, in degrees (-180, 180]. */
export function segmentAngle(a: Point, b: Point): number {
  return Math.atan2(b.y - a.y, b.x - a.x) * (180 / Math.PI)
}

/** The longest segment in path order; ties keep the first. */
export function longestSegment(points: Point[]): [Point, Point] | null {
  if (points.length < 2) return null
  let best: [Point, Point] = [points[0], points[1]]
  let bestLen = distance(points[0], points[1])
  for (let i = 1; i < points.length - 1; i++) {
    const len = distance(points[i], points[i + 1])
    if (len > bestLen) {
      bestLen = len
      best = [points[i], points[i + 1]]
    }
  }
  return best
}
