export type { Toast } from './common.ts'
export type { PDFFile, PageRaster, Rasterizer } from './pdf.ts'
