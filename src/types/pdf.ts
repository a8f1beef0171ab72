/** A PDF opened in the mapper; bytes stay on the File, not in memory */
export interface PDFFile {
  id: string
  name: string
  file: File
  pageCount: number
  size: number
}

/** A page rendered at some magnification, plus the page's size in document units */
export interface PageRaster<TImage> {
  image: TImage
  width: number            // raster pixels
  height: number
  magnification: number    // raster pixels per document unit
  pageWidth: number        // document units
  pageHeight: number
}

/** Produces page rasters; the annotation engine never decodes documents itself */
export interface Rasterizer<TImage> {
  readonly pageCount: number
  renderPage(pageIndex: number, magnification: number): Promise<PageRaster<TImage>>
}
