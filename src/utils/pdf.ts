/**
 * Browser PDF utilities for the deviation mapper.
 * pdfjs-dist rasterizes pages; nothing here touches the annotation model.
 */

import * as pdfjsLib from 'pdfjs-dist'
import type { PDFFile, PageRaster, Rasterizer } from '@/types/index.ts'

import '@/utils/pdfWorkerSetup.ts'

// Small LRU cache of parsed documents
interface CachedDoc {
  doc: pdfjsLib.PDFDocumentProxy
  lastAccess: number
}

const docCache = new Map<string, CachedDoc>()
const MAX_CACHE_SIZE = 4

function destroyDoc(doc: pdfjsLib.PDFDocumentProxy) {
  doc.destroy().catch((err: unknown) => console.warn('[Deviation Map] Failed to release PDF', err))
}

function evictOldest() {
  if (docCache.size <= MAX_CACHE_SIZE) return
  let oldestKey: string | null = null
  let oldestTime = Infinity
  for (const [key, val] of docCache) {
    if (val.lastAccess < oldestTime) {
      oldestTime = val.lastAccess
      oldestKey = key
    }
  }
  if (oldestKey) {
    const old = docCache.get(oldestKey)
    docCache.delete(oldestKey)
    if (old) destroyDoc(old.doc)
  }
}

async function getCachedDoc(pdfFile: PDFFile): Promise<pdfjsLib.PDFDocumentProxy> {
  const cached = docCache.get(pdfFile.id)
  if (cached) {
    cached.lastAccess = Date.now()
    return cached.doc
  }

  const buffer = await pdfFile.file.arrayBuffer()
  const doc = await pdfjsLib.getDocument({ data: new Uint8Array(buffer) }).promise
  docCache.set(pdfFile.id, { doc, lastAccess: Date.now() })
  evictOldest()
  return doc
}

/**
 * Parse a PDF from a browser File. Only metadata and the File reference are kept.
 */
export async function loadPDFFile(file: File): Promise<PDFFile> {
  if (file.size === 0) {
    throw new Error('File is empty')
  }

  const buffer = await file.arrayBuffer()
  const doc = await pdfjsLib.getDocument({ data: new Uint8Array(buffer) }).promise
  if (doc.numPages === 0) {
    throw new Error('PDF has no pages')
  }

  const id = crypto.randomUUID()
  docCache.set(id, { doc, lastAccess: Date.now() })
  evictOldest()

  return { id, name: file.name, file, pageCount: doc.numPages, size: file.size }
}

/**
 * Render one page (0-based) into a fresh canvas at the given magnification.
 */
export async function renderPageRaster(
  pdfFile: PDFFile,
  pageIndex: number,
  magnification: number,
): Promise<PageRaster<HTMLCanvasElement>> {
  const doc = await getCachedDoc(pdfFile)
  if (pageIndex < 0 || pageIndex >= doc.numPages) {
    throw new Error(`Invalid page number ${pageIndex + 1}`)
  }

  const page = await doc.getPage(pageIndex + 1)
  const base = page.getViewport({ scale: 1 })
  const viewport = page.getViewport({ scale: magnification })

  const canvas = document.createElement('canvas')
  const ctx = canvas.getContext('2d')
  if (!ctx) throw new Error('Failed to get canvas context')

  canvas.width = Math.floor(viewport.width)
  canvas.height = Math.floor(viewport.height)

  await page.render({ canvasContext: ctx, viewport }).promise
  page.cleanup()

  return {
    image: canvas,
    width: canvas.width,
    height: canvas.height,
    magnification,
    pageWidth: base.width,
    pageHeight: base.height,
  }
}

export function createPdfRasterizer(pdfFile: PDFFile): Rasterizer<HTMLCanvasElement> {
  return {
    pageCount: pdfFile.pageCount,
    renderPage: (pageIndex, magnification) => renderPageRaster(pdfFile, pageIndex, magnification),
  }
}

export function removePDFFromCache(fileId: string): void {
  const cached = docCache.get(fileId)
  if (cached) {
    docCache.delete(fileId)
    destroyDoc(cached.doc)
  }
}
