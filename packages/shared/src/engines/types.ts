/**
 * OCR Engine Types
 *
 * Every text/table backend implements OcrEngine. The cascades in
 * ../extraction iterate engines in preference order and never call a backend
 * library directly.
 */

export type EngineName = 'direct_text' | 'tesseract' | 'openai_vision';

export type EngineCapability = 'text' | 'table';

/**
 * Where an engine sits in the cascade:
 * - 'direct': reads the PDF text layer (cheap, exact for born-digital PDFs)
 * - 'local_ocr': rasterizes pages and recognizes them in-process
 * - 'cloud_ocr': submits the document to a networked OCR service
 */
export type EngineTier = 'direct' | 'local_ocr' | 'cloud_ocr';

export type TableGrid = string[][];

export interface OcrEngine {
  readonly name: EngineName;
  readonly tier: EngineTier;
  readonly description: string;
  readonly capabilities: readonly EngineCapability[];

  /** False when the engine is not configured (missing key, disabled, ...) */
  isAvailable(): boolean;

  extractText(filePath: string): Promise<string>;

  /** Present only on engines with the 'table' capability */
  extractTable?(filePath: string, pageIndex: number): Promise<TableGrid>;
}

export interface TableEngine extends OcrEngine {
  extractTable(filePath: string, pageIndex: number): Promise<TableGrid>;
}

/**
 * Cascade order per capability: cheap/exact first, networked/paid last for
 * text; geometry-aware engines only for tables.
 */
export const ENGINE_PREFERENCES: Record<EngineCapability, readonly EngineName[]> = {
  text: ['direct_text', 'tesseract', 'openai_vision'],
  table: ['openai_vision', 'tesseract'],
};

export function supportsTables(engine: OcrEngine): engine is TableEngine {
  return engine.capabilities.includes('table') && typeof engine.extractTable === 'function';
}
