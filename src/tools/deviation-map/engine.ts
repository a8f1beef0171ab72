import type { PageRaster, Rasterizer } from '@/types/index.ts'
import type { Point, RenderHint, Size } from './types.ts'
import { BASE_RENDER_SCALE, KEY_ZOOM_FACTOR } from './types.ts'
import { ViewTransform } from './viewTransform.ts'
import { EditSession } from './editSession.ts'
import type { NodeStore } from './nodeStore.ts'
import type { OverlayContext } from './overlayRenderer.ts'
import { renderOverlay } from './overlayRenderer.ts'

// ── Host seams ──────────────────────────────────────────────

/** The visible canvas the composite is painted onto. */
export interface CompositeSurface<TImage> {
  clearRect(x: number, y: number, w: number, h: number): void
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void
}

export interface LayerContext<TImage> extends OverlayContext {
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void
}

/** An offscreen image plus the context that paints it. */
export interface RasterLayer<TImage> {
  ctx: LayerContext<TImage>
  image: TImage
  width: number
  height: number
}

export interface EngineOptions<TImage> {
  store: NodeStore
  surface: CompositeSurface<TImage>
  createLayer: (width: number, height: number) => RasterLayer<TImage>
  renderScale?: number
  onError?: (err: unknown) => void
}

export interface FrameCounters {
  full: number
  overlay: number
  rasterRequests: number
}

/**
 * Ties the view, edit session and overlay to a rasterizer and a host surface.
 * Every input re-renders synchronously with whatever raster is cached; a fresh
 * raster is requested whenever the magnification or page no longer matches.
 */
export class DeviationMapEngine<TImage> {
  readonly view: ViewTransform
  readonly session: EditSession
  readonly frames: FrameCounters = { full: 0, overlay: 0, rasterRequests: 0 }

  private store: NodeStore
  private surface: CompositeSurface<TImage>
  private createLayer: (width: number, height: number) => RasterLayer<TImage>
  private onError: (err: unknown) => void
  private rasterizer: Rasterizer<TImage> | null = null
  private raster: { page: number; data: PageRaster<TImage> } | null = null
  private overlay: RasterLayer<TImage> | null = null
  private requestSeq = 0
  private pending: { page: number; magnification: number; done: Promise<void> } | null = null
  private inInput = false
  private unsubscribe: () => void

  constructor(opts: EngineOptions<TImage>) {
    this.store = opts.store
    this.surface = opts.surface
    this.createLayer = opts.createLayer
    this.onError = opts.onError ?? ((err) => console.error('[Deviation Map] Render failed:', err))
    this.view = new ViewTransform(opts.renderScale ?? BASE_RENDER_SCALE)
    this.session = new EditSession(this.store, this.view)

    // Mutations from outside the session (deviation edits, loads) still repaint
    this.unsubscribe = this.store.subscribe(() => {
      if (!this.inInput) void this.renderFull()
    })
  }

  dispose(): void {
    this.unsubscribe()
    this.session.dispose()
    this.requestSeq++
    this.pending = null
  }

  get pageCount(): number {
    return this.rasterizer?.pageCount ?? 0
  }

  get currentRaster(): PageRaster<TImage> | null {
    return this.raster && this.raster.page === this.view.state.page ? this.raster.data : null
  }

  // ── Document / pages ────────────────────────────────────

  open(rasterizer: Rasterizer<TImage>): Promise<void> {
    this.runInput(() => this.session.escape())
    this.rasterizer = rasterizer
    this.raster = null
    this.pending = null
    this.requestSeq++
    this.view.setPage(0)
    return this.renderFull()
  }

  goToPage(index: number): Promise<void> {
    const { page } = this.view.state
    if (!this.rasterizer || index < 0 || index >= this.rasterizer.pageCount || index === page) {
      return Promise.resolve()
    }
    this.runInput(() => this.session.escape())
    this.view.setPage(index)
    return this.renderFull()
  }

  nextPage(): Promise<void> {
    return this.goToPage(this.view.state.page + 1)
  }

  prevPage(): Promise<void> {
    return this.goToPage(this.view.state.page - 1)
  }

  // ── View ────────────────────────────────────────────────

  resize(size: Size): void {
    this.view.setViewport(size)
    void this.renderFull()
  }

  zoomAt(anchor: Point, factor: number): void {
    this.view.zoomAt(anchor, factor)
    void this.renderFull()
  }

  zoomIn(): void {
    this.view.zoomBy(KEY_ZOOM_FACTOR)
    void this.renderFull()
  }

  zoomOut(): void {
    this.view.zoomBy(1 / KEY_ZOOM_FACTOR)
    void this.renderFull()
  }

  resetZoom(): void {
    this.view.resetToFit(this.view.viewportSize, this.view.pageSize)
    void this.renderFull()
  }

  panBy(dx: number, dy: number): void {
    this.view.panBy(dx, dy)
    void this.renderFull()
  }

  // ── Pointer / keyboard ──────────────────────────────────

  click(p: Point): RenderHint { return this.input(() => this.session.click(p)) }
  doubleClick(p: Point): RenderHint { return this.input(() => this.session.doubleClick(p)) }
  rightClick(p: Point): RenderHint { return this.input(() => this.session.rightClick(p)) }
  dragTo(p: Point): RenderHint { return this.input(() => this.session.dragTo(p)) }
  release(): RenderHint { return this.input(() => this.session.release()) }
  escape(): RenderHint { return this.input(() => this.session.escape()) }
  startLine(): RenderHint { return this.input(() => this.session.startCreate()) }
  finishLine(): RenderHint { return this.input(() => this.session.finish()) }
  deleteSelected(): RenderHint { return this.input(() => this.session.deleteSelected()) }

  private runInput(fn: () => RenderHint): RenderHint {
    this.inInput = true
    try {
      return fn()
    } finally {
      this.inInput = false
    }
  }

  private input(fn: () => RenderHint): RenderHint {
    const hint = this.runInput(fn)
    if (hint === 'full') void this.renderFull()
    else if (hint === 'overlay') this.renderOverlayOnly()
    return hint
  }

  // ── Rendering ───────────────────────────────────────────

  /**
   * Full recomposition. Resolves once any raster this frame had to request
   * has arrived and been composited (or been superseded).
   */
  renderFull(): Promise<void> {
    this.frames.full++
    this.adoptCachedPageSize()
    this.paint()
    return this.ensureRaster()
  }

  /** Overlay redraw over the cached raster; never asks the rasterizer. */
  renderOverlayOnly(): void {
    this.frames.overlay++
    this.paint()
  }

  /** Raster and overlay flattened at raster resolution, for export. */
  compositeLayer(): RasterLayer<TImage> | null {
    const raster = this.currentRaster
    if (!raster) return null
    const { width, height, magnification } = raster

    const out = this.createLayer(width, height)
    out.ctx.drawImage(raster.image, 0, 0, width, height)

    const overlay = this.createLayer(width, height)
    this.drawOverlay(overlay, magnification)
    out.ctx.drawImage(overlay.image, 0, 0, width, height)
    return out
  }

  private paint(): void {
    const { viewportWidth, viewportHeight } = this.view.state
    this.surface.clearRect(0, 0, viewportWidth, viewportHeight)

    const raster = this.currentRaster
    if (!raster || !this.view.isRenderable) return

    const scale = this.view.rasterScale
    const { pageWidth, pageHeight, panX, panY } = this.view.state
    const layer = this.overlayLayer(Math.ceil(pageWidth * scale), Math.ceil(pageHeight * scale))
    this.drawOverlay(layer, scale)

    // Both layers map the whole page onto its on-screen rectangle
    const eff = this.view.effectiveScale
    const w = pageWidth * eff, h = pageHeight * eff
    this.surface.drawImage(raster.image, panX, panY, w, h)
    this.surface.drawImage(layer.image, panX, panY, w, h)
  }

  private drawOverlay(layer: RasterLayer<TImage>, scale: number): void {
    renderOverlay(layer.ctx, {
      nodes: this.store.getState().listForPage(this.view.state.page),
      scale,
      width: layer.width,
      height: layer.height,
      decorationFor: (id) => this.session.decorationFor(id),
    })
  }

  private overlayLayer(width: number, height: number): RasterLayer<TImage> {
    const w = Math.max(1, width), h = Math.max(1, height)
    if (!this.overlay || this.overlay.width !== w || this.overlay.height !== h) {
      this.overlay = this.createLayer(w, h)
    }
    return this.overlay
  }

  /** Returning to the cached page restores the size `setPage` cleared. */
  private adoptCachedPageSize(): void {
    const cached = this.currentRaster
    if (!cached) return
    const { pageWidth, pageHeight } = this.view.state
    if (pageWidth !== cached.pageWidth || pageHeight !== cached.pageHeight) {
      this.view.setPageSize({ width: cached.pageWidth, height: cached.pageHeight })
    }
  }

  private ensureRaster(): Promise<void> {
    const rasterizer = this.rasterizer
    if (!rasterizer) return Promise.resolve()

    const page = this.view.state.page
    const magnification = this.view.rasterScale
    const cached = this.currentRaster
    if (cached && cached.magnification === magnification) {
      // Whatever is still in flight is for a page or zoom we have left
      if (this.pending) {
        this.pending = null
        this.requestSeq++
      }
      return Promise.resolve()
    }
    if (this.pending && this.pending.page === page && this.pending.magnification === magnification) {
      return this.pending.done
    }

    const seq = ++this.requestSeq
    this.frames.rasterRequests++
    const done = rasterizer.renderPage(page, magnification).then(
      (data) => {
        if (seq !== this.requestSeq) return
        this.pending = null
        this.raster = { page, data }
        this.view.setPageSize({ width: data.pageWidth, height: data.pageHeight })
        this.paint()
      },
      (err: unknown) => {
        if (seq !== this.requestSeq) return
        this.pending = null
        this.onError(err)
      },
    )
    this.pending = { page, magnification, done }
    return done
  }
}
