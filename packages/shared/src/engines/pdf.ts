/**
 * PDF Loading
 *
 * pdfjs-dist and @napi-rs/canvas are loaded on first use so processes that
 * never touch a PDF (and the test suite) do not pay for them. pdfjs paints
 * its own scratch canvases with @napi-rs/canvas under Node.
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs', { with: { 'resolution-mode': 'import' } });
type CanvasModule = typeof import('@napi-rs/canvas');

export type PdfDocument = Awaited<ReturnType<PdfJs['getDocument']>['promise']>;

let pdfjsPromise: Promise<PdfJs> | null = null;
let canvasPromise: Promise<CanvasModule> | null = null;

export function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsPromise) {
    pdfjsPromise = import('pdfjs-dist/legacy/build/pdf.mjs').then((lib) => {
      // Configure worker for Node.js environment
      lib.GlobalWorkerOptions.workerSrc = path.join(
        path.dirname(require.resolve('pdfjs-dist/package.json')),
        'legacy/build/pdf.worker.mjs'
      );
      return lib;
    });
  }
  return pdfjsPromise;
}

export function loadCanvas(): Promise<CanvasModule> {
  if (!canvasPromise) {
    canvasPromise = import('@napi-rs/canvas');
  }
  return canvasPromise;
}

/**
 * Open a PDF for text reading only.
 */
export async function openPdf(filePath: string): Promise<PdfDocument> {
  const pdfjs = await loadPdfJs();
  const data = new Uint8Array(fs.readFileSync(filePath));
  return pdfjs.getDocument({ data, useSystemFonts: true }).promise;
}

export interface RenderedPage {
  pageNumber: number;
  png: Buffer;
}

/**
 * Rasterize pages to PNG.
 *
 * @param pageIndexes - 0-based; all pages when omitted
 */
export async function renderPdfPages(
  filePath: string,
  scale: number,
  pageIndexes?: number[]
): Promise<RenderedPage[]> {
  const [canvasModule, pdf] = await Promise.all([loadCanvas(), openPdf(filePath)]);

  const wanted = pageIndexes ?? Array.from({ length: pdf.numPages }, (_, i) => i);
  const rendered: RenderedPage[] = [];

  try {
    for (const index of wanted) {
      const pageNumber = index + 1;
      if (pageNumber < 1 || pageNumber > pdf.numPages) {
        logger.warn('Requested page out of range', { filePath, pageNumber, numPages: pdf.numPages });
        continue;
      }

      const page = await pdf.getPage(pageNumber);
      const viewport = page.getViewport({ scale });
      const canvas = canvasModule.createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
      const canvasContext = canvas.getContext('2d');

      await page.render({ canvas, canvasContext, viewport }).promise;
      rendered.push({ pageNumber, png: canvas.toBuffer('image/png') });
      page.cleanup();
    }
  } finally {
    await pdf.destroy();
  }

  logger.debug('Rendered PDF pages', { filePath, pages: rendered.length, scale });
  return rendered;
}
