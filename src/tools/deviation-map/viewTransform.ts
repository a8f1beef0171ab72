import type { Point, Size, ViewState } from './types.ts'
import { BASE_RENDER_SCALE, MAX_ZOOM, MIN_ZOOM } from './types.ts'

export function clampZoom(zoom: number): number {
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom))
}

function isDegenerate(viewport: Size, page: Size): boolean {
  return viewport.width <= 1 || viewport.height <= 1 || page.width <= 0 || page.height <= 0
}

/**
 * Document ↔ screen mapping: `screen = document * effectiveScale + pan`.
 *
 * The page raster is produced at `rasterScale` (render scale × zoom). In fit
 * mode the raster is additionally shrunk or grown by `displayScale` so the
 * page fills the viewport.
 */
export class ViewTransform {
  private s: ViewState

  constructor(renderScale: number = BASE_RENDER_SCALE) {
    this.s = {
      zoomLevel: 1,
      panX: 0,
      panY: 0,
      fitToWindow: true,
      renderScale,
      displayScale: 1,
      page: 0,
      pageWidth: 0,
      pageHeight: 0,
      viewportWidth: 0,
      viewportHeight: 0,
    }
  }

  get state(): Readonly<ViewState> {
    return this.s
  }

  /** Magnification to request from the rasterizer. */
  get rasterScale(): number {
    return this.s.renderScale * this.s.zoomLevel
  }

  get effectiveScale(): number {
    return this.s.displayScale * this.rasterScale
  }

  get isRenderable(): boolean {
    return !isDegenerate(this.viewportSize, this.pageSize)
  }

  get viewportSize(): Size {
    return { width: this.s.viewportWidth, height: this.s.viewportHeight }
  }

  get pageSize(): Size {
    return { width: this.s.pageWidth, height: this.s.pageHeight }
  }

  // ── Mapping ─────────────────────────────────────────────

  toScreen(p: Point): Point {
    const scale = this.effectiveScale
    return { x: p.x * scale + this.s.panX, y: p.y * scale + this.s.panY }
  }

  toDocument(p: Point): Point {
    const scale = this.effectiveScale
    return { x: (p.x - this.s.panX) / scale, y: (p.y - this.s.panY) / scale }
  }

  /** Screen pixels → document units at the current scale. */
  toDocumentLength(px: number): number {
    return px / this.effectiveScale
  }

  // ── Zoom / pan ──────────────────────────────────────────

  zoomAt(anchor: Point, factor: number): void {
    const doc = this.toDocument(anchor)
    const base = this.s.fitToWindow ? this.s.zoomLevel * this.s.displayScale : this.s.zoomLevel
    this.s = {
      ...this.s,
      zoomLevel: clampZoom(base * factor),
      displayScale: 1,
      fitToWindow: false,
    }
    const scale = this.effectiveScale
    this.s.panX = anchor.x - doc.x * scale
    this.s.panY = anchor.y - doc.y * scale
  }

  /** Zoom about the viewport centre. */
  zoomBy(factor: number): void {
    this.zoomAt({ x: this.s.viewportWidth / 2, y: this.s.viewportHeight / 2 }, factor)
  }

  resetToFit(viewport: Size, page: Size): void {
    this.s = {
      ...this.s,
      zoomLevel: 1,
      panX: 0,
      panY: 0,
      fitToWindow: true,
      viewportWidth: viewport.width,
      viewportHeight: viewport.height,
      pageWidth: page.width,
      pageHeight: page.height,
    }
    this.refit()
  }

  panBy(dx: number, dy: number): void {
    this.s = { ...this.s, panX: this.s.panX + dx, panY: this.s.panY + dy }
  }

  // ── Host-driven updates ─────────────────────────────────

  setViewport(size: Size): void {
    this.s = { ...this.s, viewportWidth: size.width, viewportHeight: size.height }
    this.refit()
  }

  setPageSize(size: Size): void {
    this.s = { ...this.s, pageWidth: size.width, pageHeight: size.height }
    this.refit()
  }

  /** Pan and page dims reset; zoom survives unless it is back at 1. */
  setPage(page: number, renderScale: number = this.s.renderScale): void {
    this.s = {
      ...this.s,
      page,
      renderScale,
      panX: 0,
      panY: 0,
      pageWidth: 0,
      pageHeight: 0,
      fitToWindow: this.s.fitToWindow || this.s.zoomLevel === 1,
    }
    this.refit()
  }

  private refit(): void {
    if (!this.s.fitToWindow || isDegenerate(this.viewportSize, this.pageSize)) {
      this.s.displayScale = 1
      return
    }
    const raster = this.rasterScale
    this.s.displayScale = Math.min(
      this.s.viewportWidth / (this.s.pageWidth * raster),
      this.s.viewportHeight / (this.s.pageHeight * raster),
    )
  }
}
