/**
 * OCR Engines
 */

export * from './types';
export * from './registry';
export { gridFromCells, gridFromLines, type PositionedCell } from './grid';
export { directTextEngine, extractPdfTextLayer } from './direct-text';
export { TesseractEngine, bundledLangPath, type TesseractEngineOptions } from './tesseract';
export {
  OpenAiVisionEngine,
  parseTranscription,
  type OpenAiVisionEngineOptions,
  type VisionTranscription,
} from './openai-vision';

import { registerEngine } from './registry';
import { directTextEngine } from './direct-text';
import { TesseractEngine } from './tesseract';
import { OpenAiVisionEngine } from './openai-vision';

/**
 * Register the built-in engines with settings from config.
 * Call once at worker startup.
 */
export function registerDefaultEngines(): void {
  registerEngine(directTextEngine);
  registerEngine(new TesseractEngine());
  registerEngine(new OpenAiVisionEngine());
}
