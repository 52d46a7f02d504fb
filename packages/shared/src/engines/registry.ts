/**
 * Engine Registry
 *
 * Registry pattern for OCR engines. Engines register by name; the cascades
 * ask for them in preference order for a capability.
 */

import type { EngineCapability, EngineName, OcrEngine } from './types';
import { ENGINE_PREFERENCES } from './types';
import { logger } from '../logger';

const engineRegistry = new Map<EngineName, OcrEngine>();

/**
 * Register an engine. Overwrites any existing engine with the same name.
 */
export function registerEngine(engine: OcrEngine): void {
  engineRegistry.set(engine.name, engine);

  logger.debug('Registered OCR engine', {
    engine: engine.name,
    tier: engine.tier,
    capabilities: engine.capabilities,
    description: engine.description,
  });
}

export function getEngine(name: EngineName): OcrEngine | undefined {
  return engineRegistry.get(name);
}

export function hasEngine(name: EngineName): boolean {
  return engineRegistry.has(name);
}

export function getAllEngines(): OcrEngine[] {
  return Array.from(engineRegistry.values());
}

/**
 * Registered, available engines for a capability in cascade order.
 *
 * @param enabled - Engine names allowed by configuration; others are skipped
 */
export function getEnginesFor(
  capability: EngineCapability,
  enabled: readonly EngineName[] = ENGINE_PREFERENCES[capability]
): OcrEngine[] {
  const engines: OcrEngine[] = [];

  for (const name of ENGINE_PREFERENCES[capability]) {
    if (!enabled.includes(name)) continue;
    const engine = engineRegistry.get(name);
    if (!engine || !engine.capabilities.includes(capability)) continue;
    if (!engine.isAvailable()) {
      logger.debug('OCR engine registered but unavailable', { engine: name, capability });
      continue;
    }
    engines.push(engine);
  }

  return engines;
}

/**
 * Clear all registered engines.
 * Useful for testing.
 */
export function clearEngineRegistry(): void {
  engineRegistry.clear();
}
