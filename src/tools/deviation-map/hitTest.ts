import type { MapNode, Point } from './types.ts'
import { distance, distancePointToSegment } from './geometry.ts'
import type { ViewTransform } from './viewTransform.ts'

/** Proximity queries in screen-pixel tolerances over document-space nodes. */
export class HitTester {
  constructor(private view: ViewTransform) {}

  /**
   * Closest node to a screen point, across every segment and every vertex of
   * every candidate. Single-point nodes are hit through their vertex.
   */
  findAnnotationNear(screen: Point, tolerancePx: number, nodes: readonly MapNode[]): MapNode | null {
    const p = this.view.toDocument(screen)
    const tolerance = this.view.toDocumentLength(tolerancePx)

    let closest: MapNode | null = null
    let closestDist = Infinity
    for (const node of nodes) {
      const pts = node.points
      for (let i = 0; i < pts.length - 1; i++) {
        const d = distancePointToSegment(p, pts[i], pts[i + 1])
        if (d < closestDist) {
          closestDist = d
          closest = node
        }
      }
      for (const pt of pts) {
        const d = distance(p, pt)
        if (d < closestDist) {
          closestDist = d
          closest = node
        }
      }
    }

    return closest && closestDist <= tolerance ? closest : null
  }

  /** Index of the vertex nearest a document point, if within tolerance. */
  findPointNear(p: Point, node: MapNode, tolerancePx: number): number | null {
    const tolerance = this.view.toDocumentLength(tolerancePx)
    let best: number | null = null
    let bestDist = Infinity
    for (let i = 0; i < node.points.length; i++) {
      const d = distance(p, node.points[i])
      if (d < bestDist) {
        bestDist = d
        best = i
      }
    }
    return best !== null && bestDist <= tolerance ? best : null
  }

  /**
   * Splice position for a new vertex near the closest segment [i, i+1]:
   * i + 1 when the click is nearer the segment's end, otherwise i.
   */
  findInsertionIndex(p: Point, node: MapNode, tolerancePx: number): number | null {
    const pts = node.points
    if (pts.length < 2) return null
    const tolerance = this.view.toDocumentLength(tolerancePx)

    let index: number | null = null
    let closestDist = Infinity
    for (let i = 0; i < pts.length - 1; i++) {
      const d = distancePointToSegment(p, pts[i], pts[i + 1])
      if (d < closestDist) {
        closestDist = d
        index = distance(p, pts[i + 1]) < distance(p, pts[i]) ? i + 1 : i
      }
    }
    return index !== null && closestDist <= tolerance ? index : null
  }
}
