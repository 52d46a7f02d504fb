/**
 * Text Extractor
 *
 * Runs the text cascade: the PDF text layer first, OCR engines only when the
 * text layer is implausibly short. Engine failures are recorded and the
 * cascade moves on; the text layer's partial output is the last resort.
 */

import fs from 'fs';
import type { EngineName, OcrEngine } from '../engines/types';
import { getEnginesFor } from '../engines/registry';
import { ExtractionError, NoEngineAvailableError, NotFoundError, describeError } from '../errors';
import { config } from '../config';
import { logger } from '../logger';
import { recordAttempt, failuresOf, type EngineAttempt } from './attempts';

export interface TextExtractionReport {
  text: string;
  /** Engine whose output was returned */
  engine: EngineName;
  attempts: EngineAttempt[];
  /** True when every engine fell short and the short text-layer output was returned */
  used_partial_fallback: boolean;
}

export interface TextExtractorOptions {
  /** Engines in cascade order. Defaults to the registry's available text engines. */
  engines?: OcrEngine[];
  /** Text-layer output must be longer than this (trimmed) to skip OCR */
  minDirectTextChars?: number;
}

export class TextExtractor {
  private readonly engines?: OcrEngine[];
  readonly minDirectTextChars: number;

  constructor(options: TextExtractorOptions = {}) {
    this.engines = options.engines;
    this.minDirectTextChars = options.minDirectTextChars ?? config.minDirectTextChars;
  }

  async extractText(filePath: string): Promise<string> {
    const report = await this.extractTextWithReport(filePath);
    return report.text;
  }

  async extractTextWithReport(filePath: string): Promise<TextExtractionReport> {
    if (!fs.existsSync(filePath)) {
      throw new NotFoundError(`Document not found: ${filePath}`);
    }

    const engines = (this.engines ?? getEnginesFor('text', config.ocrEngines)).filter((e) =>
      e.isAvailable()
    );
    if (engines.length === 0) {
      throw new NoEngineAvailableError('No text extraction engine is available');
    }

    const attempts: EngineAttempt[] = [];
    let partial: { engine: EngineName; text: string } | null = null;

    for (const engine of engines) {
      let text: string;
      try {
        text = await engine.extractText(filePath);
      } catch (error) {
        attempts.push(
          recordAttempt('text', { engine: engine.name, outcome: 'failed', error: describeError(error) })
        );
        continue;
      }

      const size = text.trim().length;
      const sufficient = engine.tier === 'direct' ? size > this.minDirectTextChars : size > 0;

      if (sufficient) {
        attempts.push(recordAttempt('text', { engine: engine.name, outcome: 'success', size }));
        logger.info('Text extracted', { filePath, engine: engine.name, chars: size });
        return { text, engine: engine.name, attempts, used_partial_fallback: false };
      }

      attempts.push(recordAttempt('text', { engine: engine.name, outcome: 'insufficient', size }));
      if (engine.tier === 'direct' && size > 0) {
        partial = { engine: engine.name, text };
      }
    }

    if (partial) {
      logger.warn('All OCR engines fell short, returning partial text layer', {
        filePath,
        chars: partial.text.trim().length,
      });
      return { text: partial.text, engine: partial.engine, attempts, used_partial_fallback: true };
    }

    throw new ExtractionError(
      `All text extraction engines failed for ${filePath}`,
      failuresOf(attempts)
    );
  }
}
