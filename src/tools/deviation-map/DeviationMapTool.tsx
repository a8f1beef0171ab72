import { useState, useRef, useEffect, useCallback, useMemo } from 'react'
import type { PointerEvent as ReactPointerEvent, MouseEvent as ReactMouseEvent } from 'react'
import { useStore } from 'zustand'
import { FileText } from 'lucide-react'
import { FileDropZone } from '@/components/common/FileDropZone.tsx'
import { useAppStore } from '@/stores/appStore.ts'
import type { PDFFile } from '@/types/index.ts'
import { loadPDFFile, createPdfRasterizer, removePDFFromCache } from '@/utils/pdf.ts'
import { downloadBlob, downloadText, canvasToPng, baseName } from '@/utils/download.ts'
import { readFileAsText, formatFileSize } from '@/utils/fileReader.ts'
import type { Point } from './types.ts'
import { WHEEL_ZOOM_FACTOR, emptyDeviation } from './types.ts'
import { createNodeStore } from './nodeStore.ts'
import { DeviationMapEngine } from './engine.ts'
import type { RasterLayer } from './engine.ts'
import { serializeProject, parseProject } from './project.ts'
import { compositeToPdf, exportFileName } from './export.ts'
import { attachShortcuts } from './shortcuts.ts'
import type { ShortcutTarget } from './shortcuts.ts'
import { Toolbar } from './Toolbar.tsx'
import { PropertiesPanel } from './PropertiesPanel.tsx'
import type { ToolbarActions } from './Toolbar.tsx'

type Engine = DeviationMapEngine<HTMLCanvasElement>

interface ViewSnapshot {
  page: number
  pageCount: number
  zoomPercent: number
  creating: boolean
  selectedId: string | null
}

const EMPTY_SNAPSHOT: ViewSnapshot = { page: 0, pageCount: 0, zoomPercent: 100, creating: false, selectedId: null }

function snapshot(engine: Engine): ViewSnapshot {
  const { zoomLevel, displayScale, page } = engine.view.state
  return {
    page,
    pageCount: engine.pageCount,
    zoomPercent: Math.round(zoomLevel * displayScale * 100),
    creating: engine.session.isCreating,
    selectedId: engine.session.selectedId,
  }
}

function createCanvasLayer(width: number, height: number): RasterLayer<HTMLCanvasElement> {
  const canvas = document.createElement('canvas')
  canvas.width = width
  canvas.height = height
  const ctx = canvas.getContext('2d')
  if (!ctx) throw new Error('Failed to get canvas context')
  return { ctx, image: canvas, width, height }
}

function localPoint(e: { clientX: number; clientY: number }, el: HTMLElement): Point {
  const rect = el.getBoundingClientRect()
  return { x: e.clientX - rect.left, y: e.clientY - rect.top }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ── Component ───────────────────────────────────────────────

export default function DeviationMapTool() {
  const addToast = useAppStore((s) => s.addToast)
  const [store] = useState(createNodeStore)
  const [pdfFile, setPdfFile] = useState<PDFFile | null>(null)
  const [engine, setEngine] = useState<Engine | null>(null)
  const [view, setView] = useState<ViewSnapshot>(EMPTY_SNAPSHOT)
  const [busy, setBusy] = useState(false)

  const containerRef = useRef<HTMLDivElement>(null)
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const loadInputRef = useRef<HTMLInputElement>(null)
  const panRef = useRef<Point | null>(null)

  const selected = useStore(store, (s) => (view.selectedId ? s.getNode(view.selectedId) : undefined))

  const sync = useCallback(() => {
    if (engine) setView(snapshot(engine))
  }, [engine])

  const reportError = useCallback((context: string, err: unknown) => {
    console.error(`[Deviation Map] ${context}:`, err)
    addToast({ type: 'error', message: `${context}: ${errorMessage(err)}` })
  }, [addToast])

  // ── Open PDF ─────────────────────────────────────────

  const handleFile = useCallback(async (file: File) => {
    try {
      const loaded = await loadPDFFile(file)
      store.getState().clear()
      store.getState().setDocumentPath(file.name)
      setPdfFile(loaded)
    } catch (err) {
      reportError('Failed to load PDF', err)
    }
  }, [reportError, store])

  const handleClose = useCallback(() => {
    if (pdfFile) removePDFFromCache(pdfFile.id)
    store.getState().clear()
    setPdfFile(null)
    setView(EMPTY_SNAPSHOT)
  }, [pdfFile, store])

  // ── Engine lifecycle ─────────────────────────────────

  useEffect(() => {
    const canvas = canvasRef.current
    if (!pdfFile || !canvas) return
    const ctx = canvas.getContext('2d')
    if (!ctx) {
      reportError('Failed to start viewer', new Error('Failed to get canvas context'))
      return
    }

    const next = new DeviationMapEngine<HTMLCanvasElement>({
      store,
      surface: ctx,
      createLayer: createCanvasLayer,
      onError: (err) => reportError('Failed to render page', err),
    })
    const offs = [
      next.session.on('nodeSelected', () => setView(snapshot(next))),
      next.session.on('nodeDeselected', () => setView(snapshot(next))),
      next.session.on('lineCreationStarted', () => setView(snapshot(next))),
      next.session.on('lineCreationEnded', () => setView(snapshot(next))),
    ]
    setEngine(next)
    next.open(createPdfRasterizer(pdfFile)).then(() => setView(snapshot(next)), (err: unknown) => reportError('Failed to open PDF', err))

    return () => {
      offs.forEach((off) => off())
      next.dispose()
      setEngine(null)
    }
  }, [pdfFile, store, reportError])

  // Keep the canvas backing store the size of its box
  useEffect(() => {
    const el = containerRef.current
    const canvas = canvasRef.current
    if (!el || !canvas || !engine) return
    const observer = new ResizeObserver((entries) => {
      const box = entries[0]?.contentRect
      if (!box) return
      canvas.width = Math.floor(box.width)
      canvas.height = Math.floor(box.height)
      engine.resize({ width: canvas.width, height: canvas.height })
      setView(snapshot(engine))
    })
    observer.observe(el)
    return () => observer.disconnect()
  }, [engine])

  // Ctrl+wheel zooms at the cursor, plain wheel scrolls the page
  useEffect(() => {
    const el = containerRef.current
    if (!el || !engine) return
    const handler = (e: WheelEvent) => {
      e.preventDefault()
      if (e.metaKey || e.ctrlKey) {
        engine.zoomAt(localPoint(e, el), e.deltaY < 0 ? WHEEL_ZOOM_FACTOR : 1 / WHEEL_ZOOM_FACTOR)
      } else {
        engine.panBy(-e.deltaX, -e.deltaY)
      }
      setView(snapshot(engine))
    }
    el.addEventListener('wheel', handler, { passive: false })
    return () => el.removeEventListener('wheel', handler)
  }, [engine])

  // ── Pointer input ────────────────────────────────────

  const handlePointerDown = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    if (!engine) return
    const p = localPoint(e, e.currentTarget)
    if (e.button === 1) {
      e.preventDefault()
      panRef.current = p
      e.currentTarget.setPointerCapture(e.pointerId)
      return
    }
    if (e.button !== 0) return
    engine.click(p)
    if (engine.session.state.kind === 'dragging') e.currentTarget.setPointerCapture(e.pointerId)
  }, [engine])

  const handlePointerMove = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    if (!engine) return
    const p = localPoint(e, e.currentTarget)
    const pan = panRef.current
    if (pan) {
      engine.panBy(p.x - pan.x, p.y - pan.y)
      panRef.current = p
      return
    }
    if (e.buttons & 1) engine.dragTo(p)
  }, [engine])

  const handlePointerUp = useCallback((e: ReactPointerEvent<HTMLCanvasElement>) => {
    if (!engine) return
    if (e.currentTarget.hasPointerCapture(e.pointerId)) e.currentTarget.releasePointerCapture(e.pointerId)
    panRef.current = null
    engine.release()
  }, [engine])

  const handleDoubleClick = useCallback((e: ReactMouseEvent<HTMLCanvasElement>) => {
    if (!engine) return
    engine.doubleClick(localPoint(e, e.currentTarget))
  }, [engine])

  const handleContextMenu = useCallback((e: ReactMouseEvent<HTMLCanvasElement>) => {
    e.preventDefault()
    if (!engine) return
    engine.rightClick(localPoint(e, e.currentTarget))
    setView(snapshot(engine))
  }, [engine])

  // ── File actions ─────────────────────────────────────

  const docName = pdfFile ? baseName(pdfFile.name) : 'analysis'

  const handleSave = useCallback(() => {
    const { documentPath, nodes } = store.getState()
    downloadText(serializeProject({ documentPath, nodes }), exportFileName(docName, 0, 'json'), 'application/json')
    addToast({ type: 'success', message: `Saved ${nodes.length} line${nodes.length === 1 ? '' : 's'}` })
  }, [store, docName, addToast])

  const handleLoadFile = useCallback(async (file: File) => {
    try {
      const project = parseProject(await readFileAsText(file))
      store.getState().load(project.documentPath ?? pdfFile?.name ?? null, project.nodes)
      if (project.documentPath && pdfFile && project.documentPath !== pdfFile.name) {
        addToast({ type: 'warning', message: `Analysis was saved for ${project.documentPath}` })
      }
      addToast({ type: 'success', message: `Loaded ${project.nodes.length} lines` })
    } catch (err) {
      reportError('Failed to load analysis', err)
    }
  }, [store, pdfFile, addToast, reportError])

  const exportComposite = useCallback(async (format: 'png' | 'pdf') => {
    if (!engine) return
    const layer = engine.compositeLayer()
    if (!layer) {
      addToast({ type: 'warning', message: 'Page is still rendering' })
      return
    }
    setBusy(true)
    try {
      const png = await canvasToPng(layer.image)
      const name = exportFileName(docName, engine.view.state.page, format)
      if (format === 'png') {
        downloadBlob(png, name, 'image/png')
      } else {
        downloadBlob(await compositeToPdf(png, engine.view.pageSize, name), name, 'application/pdf')
      }
    } catch (err) {
      reportError('Export failed', err)
    } finally {
      setBusy(false)
    }
  }, [engine, docName, addToast, reportError])

  // ── Toolbar + keyboard ───────────────────────────────

  const target = useMemo<ShortcutTarget | null>(() => {
    if (!engine) return null
    const after = <T,>(fn: () => T) => () => {
      const out = fn()
      setView(snapshot(engine))
      return out
    }
    const afterPage = (fn: () => Promise<void>) => () => fn().then(() => setView(snapshot(engine)))
    return {
      startLine: after(() => engine.startLine()),
      finishLine: after(() => engine.finishLine()),
      escape: after(() => engine.escape()),
      deleteSelected: after(() => engine.deleteSelected()),
      zoomIn: after(() => engine.zoomIn()),
      zoomOut: after(() => engine.zoomOut()),
      resetZoom: after(() => engine.resetZoom()),
      nextPage: afterPage(() => engine.nextPage()),
      prevPage: afterPage(() => engine.prevPage()),
    }
  }, [engine])

  useEffect(() => {
    if (!target) return
    return attachShortcuts(target, { onSave: handleSave })
  }, [target, handleSave])

  const actions = useMemo<ToolbarActions | null>(() => {
    if (!target) return null
    return {
      startLine: () => { target.startLine() },
      finishLine: () => { target.finishLine() },
      cancel: () => { target.escape() },
      zoomIn: target.zoomIn,
      zoomOut: target.zoomOut,
      resetZoom: target.resetZoom,
      prevPage: () => { void target.prevPage() },
      nextPage: () => { void target.nextPage() },
      addDeviation: () => {
        if (view.selectedId) store.getState().addDeviation(view.selectedId, emptyDeviation())
      },
      deleteSelected: () => { target.deleteSelected() },
      save: handleSave,
      load: () => loadInputRef.current?.click(),
      exportPng: () => { void exportComposite('png') },
      exportPdf: () => { void exportComposite('pdf') },
    }
  }, [target, view.selectedId, store, handleSave, exportComposite])

  // Re-read the snapshot after every engine swap
  useEffect(sync, [sync])

  // ── Render ───────────────────────────────────────────

  if (!pdfFile) {
    return (
      <FileDropZone
        onFile={(file) => { void handleFile(file) }}
        onRejected={(file, reason) => addToast({
          type: 'warning',
          message: reason === 'type' ? `${file.name} is not a PDF` : `${file.name} is too large`,
        })}
        extensions={['pdf']}
        label="Drop a PDF file here"
        description="Draw lines over the drawing and attach deviations"
        className="h-full"
      />
    )
  }

  return (
    <div className="h-full flex flex-col">
      {actions && (
        <Toolbar
          page={view.page}
          pageCount={view.pageCount}
          zoomPercent={view.zoomPercent}
          creating={view.creating}
          selectedName={selected?.name ?? null}
          deviationCount={selected?.deviations.length ?? 0}
          busy={busy}
          actions={actions}
        />
      )}

      <div className="flex-1 flex min-h-0">
        <div ref={containerRef} className="flex-1 relative overflow-hidden bg-dark-base">
          <canvas
            ref={canvasRef}
            className={`absolute inset-0 ${view.creating ? 'cursor-crosshair' : 'cursor-default'}`}
            onPointerDown={handlePointerDown}
            onPointerMove={handlePointerMove}
            onPointerUp={handlePointerUp}
            onDoubleClick={handleDoubleClick}
            onContextMenu={handleContextMenu}
          />
        </div>
        <PropertiesPanel store={store} nodeId={view.selectedId} />
      </div>

      <div className="flex items-center gap-2 px-3 py-1 border-t border-white/[0.06] text-[10px] text-white/40 flex-shrink-0">
        <FileText size={12} />
        <span className="truncate">{pdfFile.name}</span>
        <span>{formatFileSize(pdfFile.size)}</span>
        <div className="flex-1" />
        <button onClick={handleClose} className="text-white/40 hover:text-white transition-colors">
          Close
        </button>
      </div>

      <input
        ref={loadInputRef}
        type="file"
        accept="application/json,.json"
        className="hidden"
        onChange={(e) => {
          const file = e.target.files?.[0]
          e.target.value = ''
          if (file) void handleLoadFile(file)
        }}
      />
    </div>
  )
}
