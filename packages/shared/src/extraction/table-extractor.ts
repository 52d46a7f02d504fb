/**
 * Table Extractor
 *
 * Cascade over table-capable engines. An empty grid moves on to the next
 * engine; `[]` is returned when no engine found a table and at least one ran.
 */

import fs from 'fs';
import { supportsTables, type OcrEngine, type TableEngine, type TableGrid } from '../engines/types';
import { getEnginesFor } from '../engines/registry';
import { ExtractionError, NoEngineAvailableError, NotFoundError, describeError } from '../errors';
import { config } from '../config';
import { logger } from '../logger';
import { recordAttempt, failuresOf, type EngineAttempt } from './attempts';

export interface TableExtractorOptions {
  /** Engines in cascade order. Defaults to the registry's available table engines. */
  engines?: OcrEngine[];
}

export class TableExtractor {
  private readonly engines?: OcrEngine[];

  constructor(options: TableExtractorOptions = {}) {
    this.engines = options.engines;
  }

  async extractTable(filePath: string, pageIndex = 0): Promise<TableGrid> {
    if (!fs.existsSync(filePath)) {
      throw new NotFoundError(`Document not found: ${filePath}`);
    }

    const engines: TableEngine[] = (this.engines ?? getEnginesFor('table', config.ocrEngines))
      .filter(supportsTables)
      .filter((e) => e.isAvailable());
    if (engines.length === 0) {
      throw new NoEngineAvailableError('No table extraction engine is available');
    }

    const attempts: EngineAttempt[] = [];

    for (const engine of engines) {
      let grid: TableGrid;
      try {
        grid = await engine.extractTable(filePath, pageIndex);
      } catch (error) {
        attempts.push(
          recordAttempt('table', { engine: engine.name, outcome: 'failed', error: describeError(error) })
        );
        continue;
      }

      if (grid.length > 0) {
        attempts.push(recordAttempt('table', { engine: engine.name, outcome: 'success', size: grid.length }));
        logger.info('Table extracted', { filePath, pageIndex, engine: engine.name, rows: grid.length });
        return grid;
      }
      attempts.push(recordAttempt('table', { engine: engine.name, outcome: 'insufficient', size: 0 }));
    }

    if (attempts.some((a) => a.outcome === 'insufficient')) {
      logger.info('No table found', { filePath, pageIndex });
      return [];
    }

    throw new ExtractionError(
      `All table extraction engines failed for ${filePath}`,
      failuresOf(attempts)
    );
  }
}
