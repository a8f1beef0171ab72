import { PDFDocument } from 'pdf-lib'
import type { Size } from './types.ts'

/**
 * One-page PDF holding a PNG composite stretched over a page of the given
 * document size (PDF points).
 */
export async function compositeToPdf(png: Uint8Array, pageSize: Size, title?: string): Promise<Uint8Array> {
  if (pageSize.width <= 0 || pageSize.height <= 0) {
    throw new Error('Cannot export a page with no size')
  }

  const pdf = await PDFDocument.create()
  if (title) pdf.setTitle(title)
  const image = await pdf.embedPng(png)
  const page = pdf.addPage([pageSize.width, pageSize.height])
  page.drawImage(image, { x: 0, y: 0, width: pageSize.width, height: pageSize.height })
  return pdf.save()
}

export function exportFileName(documentName: string, page: number, ext: 'png' | 'pdf' | 'json'): string {
  return ext === 'json' ? `${documentName}_analysis.json` : `${documentName}_page${page + 1}.${ext}`
}
