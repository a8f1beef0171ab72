/**
 * PDF.js worker setup. Import for side effects before the first getDocument call.
 */

import * as pdfjsLib from 'pdfjs-dist'

try {
  pdfjsLib.GlobalWorkerOptions.workerSrc = new URL(
    'pdfjs-dist/build/pdf.worker.min.mjs',
    import.meta.url,
  ).toString()
} catch (err) {
  // No worker URL outside a bundler; pdfjs falls back to its fake worker
  console.warn('[Deviation Map] PDF worker setup skipped', err)
}
