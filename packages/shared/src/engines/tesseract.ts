/**
 * Local OCR Engine (Tesseract)
 *
 * Rasterizes each page and recognizes it with tesseract.js. Text pages are
 * joined by a blank line; tables are rebuilt from recognized lines, one row
 * per line and one cell per word.
 */

import path from 'path';
import type { OcrEngine, TableGrid } from './types';
import { renderPdfPages, type RenderedPage } from './pdf';
import { gridFromLines } from './grid';
import { config } from '../config';
import { logger } from '../logger';

type TesseractModule = typeof import('tesseract.js');
type TesseractWorker = Awaited<ReturnType<TesseractModule['createWorker']>>;

/**
 * Directory of the traineddata shipped in the `@tesseract.js-data/<lang>`
 * package, so recognition never downloads language data.
 */
export function bundledLangPath(lang: string): string {
  const packageJson = require.resolve(`@tesseract.js-data/${lang}/package.json`);
  return path.join(path.dirname(packageJson), '4.0.0_best_int');
}

export interface TesseractEngineOptions {
  lang?: string;
  langPath?: string;
  rasterScale?: number;
}

export class TesseractEngine implements OcrEngine {
  readonly name = 'tesseract';
  readonly tier = 'local_ocr';
  readonly description = 'Rasterized pages recognized with tesseract.js';
  readonly capabilities = ['text', 'table'] as const;

  private readonly lang: string;
  private readonly langPath: string;
  private readonly rasterScale: number;

  constructor(options: TesseractEngineOptions = {}) {
    this.lang = options.lang ?? config.tesseractLang;
    this.langPath = options.langPath ?? config.tesseractLangPath;
    this.rasterScale = options.rasterScale ?? config.rasterScale;
  }

  isAvailable(): boolean {
    return this.lang !== '';
  }

  async extractText(filePath: string): Promise<string> {
    const pages = await renderPdfPages(filePath, this.rasterScale);
    const texts = await this.withWorker(async (worker) => {
      const out: string[] = [];
      for (const page of pages) {
        const { data } = await worker.recognize(page.png);
        out.push(data.text.trim());
      }
      return out;
    });
    return texts.join('\n\n');
  }

  async extractTable(filePath: string, pageIndex: number): Promise<TableGrid> {
    const pages = await renderPdfPages(filePath, this.rasterScale, [pageIndex]);
    if (pages.length === 0) return [];

    const lines = await this.withWorker((worker) => recognizeLines(worker, pages[0]));
    return gridFromLines(lines);
  }

  private async withWorker<T>(fn: (worker: TesseractWorker) => Promise<T>): Promise<T> {
    const tesseract = await import('tesseract.js');
    const langPath = this.langPath || bundledLangPath(this.lang);
    const worker = await tesseract.createWorker(this.lang, undefined, { langPath });

    try {
      return await fn(worker);
    } finally {
      await worker.terminate();
    }
  }
}

async function recognizeLines(worker: TesseractWorker, page: RenderedPage): Promise<string[][]> {
  const { data } = await worker.recognize(page.png);
  const lines = data.lines.map((line) => line.words.map((word) => word.text));

  logger.debug('Tesseract table lines recognized', {
    pageNumber: page.pageNumber,
    lines: lines.length,
  });
  return lines;
}
