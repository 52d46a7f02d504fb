/**
 * Direct Text Engine
 *
 * Reads the PDF text layer with pdfjs-dist. Glyph runs are grouped by their
 * rounded Y position so each visual line becomes one text line; pages are
 * joined by a blank line.
 */

import type { OcrEngine } from './types';
import { openPdf } from './pdf';
import { logger } from '../logger';

interface PositionedRun {
  x: number;
  str: string;
}

export async function extractPdfTextLayer(filePath: string): Promise<string> {
  const pdf = await openPdf(filePath);
  const pages: string[] = [];

  for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
    const page = await pdf.getPage(pageNum);
    const textContent = await page.getTextContent();

    const runsByY = new Map<number, PositionedRun[]>();
    for (const item of textContent.items) {
      if (!('str' in item) || item.str.trim() === '') continue;

      const y = Math.round(Number(item.transform[5]));
      const x = Math.round(Number(item.transform[4]));
      const runs = runsByY.get(y) ?? [];
      runs.push({ x, str: item.str });
      runsByY.set(y, runs);
    }

    // PDF user space grows upward, so larger Y is higher on the page
    const lines = Array.from(runsByY.keys())
      .sort((a, b) => b - a)
      .map((y) =>
        (runsByY.get(y) ?? [])
          .sort((a, b) => a.x - b.x)
          .map((run) => run.str)
          .join(' ')
          .trim()
      )
      .filter((line) => line !== '');

    pages.push(lines.join('\n'));
    page.cleanup();
  }

  await pdf.destroy();

  const text = pages.join('\n\n');
  logger.debug('PDF text layer read', { filePath, pages: pages.length, chars: text.length });
  return text;
}

export const directTextEngine: OcrEngine = {
  name: 'direct_text',
  tier: 'direct',
  description: 'PDF text layer via pdfjs-dist',
  capabilities: ['text'],
  isAvailable: () => true,
  extractText: extractPdfTextLayer,
};
