import type { EngineCapability, EngineName } from '../engines/types';
import { engineAttemptsCounter } from '../metrics';
import { logger } from '../logger';

/**
 * Result of running one engine inside a cascade.
 */
export type EngineAttempt =
  | { engine: EngineName; outcome: 'success'; size: number }
  | { engine: EngineName; outcome: 'insufficient'; size: number }
  | { engine: EngineName; outcome: 'failed'; error: string };

export function recordAttempt(capability: EngineCapability, attempt: EngineAttempt): EngineAttempt {
  engineAttemptsCounter.inc({ engine: attempt.engine, capability, outcome: attempt.outcome });

  if (attempt.outcome === 'failed') {
    logger.warn('OCR engine failed, continuing cascade', {
      engine: attempt.engine,
      capability,
      error: attempt.error,
    });
  } else {
    logger.debug('OCR engine attempt', { ...attempt, capability });
  }
  return attempt;
}

export function failuresOf(attempts: EngineAttempt[]): Array<{ engine: string; error: string }> {
  const failures: Array<{ engine: string; error: string }> = [];
  for (const attempt of attempts) {
    if (attempt.outcome === 'failed') {
      failures.push({ engine: attempt.engine, error: attempt.error });
    }
  }
  return failures;
}
