/**
 * JSON Schema Validation
 *
 * Ajv (2020-12) validators for stored extractions and API request bodies.
 * Schemas live in docs/contracts and are compiled on first use.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type {
  CreateJobRequest,
  FeedbackExtraction,
  IssueResolution,
  PayrollExtraction,
} from './types';
import { config } from './config';
import { logger } from './logger';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    ...(config.contractsDir ? [path.join(config.contractsDir, schemaName)] : []),
    // Sources (ts-jest, ts-node)
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Compiled output under dist/packages/shared/src
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null) return parsed;
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let validateFn: ValidateFunction<T> | null = null;
  return () => {
    if (!validateFn) validateFn = ajv.compile<T>(loadSchema(schemaName));
    return validateFn;
  };
}

const payrollValidator = lazyValidator<PayrollExtraction>('payroll_extraction.schema.json');
const feedbackValidator = lazyValidator<FeedbackExtraction>('feedback_extraction.schema.json');
const resolutionValidator = lazyValidator<{ resolutions: IssueResolution[] }>(
  'resolution_request.schema.json'
);
const createJobValidator = lazyValidator<CreateJobRequest>('create_job_request.schema.json');

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function check<T>(
  getValidator: () => ValidateFunction<T>,
  label: string,
  data: unknown
): SchemaCheck<T> {
  const validateFn = getValidator();
  if (validateFn(data)) {
    return { valid: true, value: data };
  }

  const errors = (validateFn.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

export function validatePayrollExtraction(data: unknown): SchemaCheck<PayrollExtraction> {
  return check(payrollValidator, 'PayrollExtraction', data);
}

export function validateFeedbackExtraction(data: unknown): SchemaCheck<FeedbackExtraction> {
  return check(feedbackValidator, 'FeedbackExtraction', data);
}

export function validateResolutionRequest(
  data: unknown
): SchemaCheck<{ resolutions: IssueResolution[] }> {
  return check(resolutionValidator, 'ResolutionRequest', data);
}

export function validateCreateJobRequest(data: unknown): SchemaCheck<CreateJobRequest> {
  return check(createJobValidator, 'CreateJobRequest', data);
}
