/**
 * Processing Service
 *
 * The operations the API and workers call: create a job, extract both
 * documents, validate, and resolve issues. Persistence goes through the
 * RecordStore contract; document reading goes through injected sources so
 * tests never touch OCR engines or real workbooks.
 */

import { v4 as uuidv4 } from 'uuid';
import type { WorkBook } from 'xlsx';
import type {
  CreateJobRequest,
  ExtractedDataRecord,
  FeedbackExtraction,
  FileKind,
  IssueResolution,
  PayrollExtraction,
  ProcessingJob,
  ResolveIssuesResponse,
  UploadedFile,
  ValidationResultRecord,
  ValidationSummary,
} from '../types';
import type { RecordStore } from '../store/types';
import { TextExtractor } from '../extraction/text-extractor';
import { extractPayroll, type PayrollTextSource } from '../parsers/payroll';
import { extractFeedback, readWorkbook } from '../parsers/feedback';
import { validate } from '../validation/validator';
import type { ValidationRules } from '../validation/rules';
import { applyResolutions } from '../validation/resolution';
import { summarizeIssues } from '../validation/summary';
import { validateFeedbackExtraction, validatePayrollExtraction } from '../schemas';
import { canTransition, transitionPatch } from './status';
import { JobNotFoundError, MissingExtractionError, NotFoundError, describeError } from '../errors';
import { extractionDurationHistogram } from '../metrics';
import { logger } from '../logger';

export interface ProcessingServiceDeps {
  store: RecordStore;
  textSource?: PayrollTextSource;
  readWorkbook?: (filePath: string) => WorkBook;
  validationRules?: Partial<ValidationRules>;
}

export interface ExtractionFailure {
  kind: FileKind;
  error: string;
}

export interface ExtractionRunResult {
  job: ProcessingJob;
  failures: ExtractionFailure[];
}

const FILE_KINDS: readonly FileKind[] = ['payroll', 'feedback'];

export class ProcessingService {
  private readonly store: RecordStore;
  private readonly textSource: PayrollTextSource;
  private readonly readWorkbook: (filePath: string) => WorkBook;
  private readonly validationRules: Partial<ValidationRules>;

  constructor(deps: ProcessingServiceDeps) {
    this.store = deps.store;
    this.textSource = deps.textSource ?? new TextExtractor();
    this.readWorkbook = deps.readWorkbook ?? readWorkbook;
    this.validationRules = deps.validationRules ?? {};
  }

  // ==========================================================================
  // Jobs
  // ==========================================================================

  async createJob(request: CreateJobRequest): Promise<ProcessingJob> {
    const now = new Date().toISOString();
    const files: UploadedFile[] = request.files.map((file) => ({ id: uuidv4(), ...file }));

    const job: ProcessingJob = {
      id: uuidv4(),
      month: request.month,
      year: request.year,
      status: 'uploaded',
      files,
      extracted_data_ids: {},
      created_at: now,
      updated_at: now,
    };

    const created = await this.store.create('jobs', job);
    logger.info('Processing job created', { job_id: job.id, files: files.length });
    return created;
  }

  async getJob(jobId: string): Promise<ProcessingJob> {
    const job = await this.store.get('jobs', jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  private async updateJob(jobId: string, patch: Partial<ProcessingJob>): Promise<ProcessingJob> {
    const updated = await this.store.update('jobs', jobId, patch);
    if (!updated) throw new JobNotFoundError(jobId);
    return updated;
  }

  private async failJob(job: ProcessingJob, reason: string, extra: Partial<ProcessingJob> = {}) {
    if (!canTransition(job.status, 'failed')) {
      logger.warn('Job cannot move to failed from its current status', {
        job_id: job.id,
        status: job.status,
        reason,
      });
      return job;
    }
    logger.warn('Processing job failed', { job_id: job.id, reason });
    return this.updateJob(job.id, transitionPatch(job, 'failed', { ...extra, failure_reason: reason }));
  }

  // ==========================================================================
  // Extraction
  // ==========================================================================

  extractPayroll(filePath: string): Promise<PayrollExtraction> {
    return extractPayroll(filePath, this.textSource);
  }

  async extractFeedback(filePath: string): Promise<FeedbackExtraction> {
    return extractFeedback(filePath, this.readWorkbook);
  }

  private async extractFile(job: ProcessingJob, file: UploadedFile): Promise<ExtractedDataRecord> {
    const startTime = Date.now();
    const content =
      file.kind === 'payroll' ? await this.extractPayroll(file.path) : await this.extractFeedback(file.path);
    extractionDurationHistogram.observe({ document_kind: file.kind }, (Date.now() - startTime) / 1000);

    return this.store.create('extracted_data', {
      id: uuidv4(),
      job_id: job.id,
      file_id: file.id,
      data_type: file.kind,
      content,
      extracted_at: new Date().toISOString(),
    });
  }

  /**
   * Extract the payroll and feedback files concurrently. Successful
   * extractions are kept even when the other one fails, and the job then
   * moves to failed.
   */
  async runExtraction(jobId: string): Promise<ExtractionRunResult> {
    let job = await this.getJob(jobId);
    // A retried queue job finds the record already in processing
    if (job.status !== 'processing') {
      job = await this.updateJob(jobId, transitionPatch(job, 'processing'));
    }

    const failures: ExtractionFailure[] = [];
    const extractedIds: Partial<Record<FileKind, string>> = {};

    const tasks = FILE_KINDS.map((kind) => {
      const file = job.files.find((f) => f.kind === kind);
      if (!file) return Promise.reject(new Error(`No ${kind} file uploaded`));
      return this.extractFile(job, file);
    });

    const settled = await Promise.allSettled(tasks);
    settled.forEach((outcome, i) => {
      const kind = FILE_KINDS[i];
      if (outcome.status === 'fulfilled') {
        extractedIds[kind] = outcome.value.id;
      } else {
        failures.push({ kind, error: describeError(outcome.reason) });
        logger.error(`${kind} extraction failed`, outcome.reason, { job_id: jobId });
      }
    });

    const extracted_data_ids = { ...job.extracted_data_ids, ...extractedIds };

    if (failures.length > 0) {
      const reason = failures.map((f) => `${f.kind}: ${f.error}`).join('; ');
      job = await this.failJob(job, reason, { extracted_data_ids });
      return { job, failures };
    }

    job = await this.updateJob(jobId, { extracted_data_ids, updated_at: new Date().toISOString() });
    logger.info('Extraction complete', { job_id: jobId, extracted_data_ids });
    return { job, failures };
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  private async loadExtraction(job: ProcessingJob, kind: FileKind): Promise<unknown> {
    const id = job.extracted_data_ids[kind];
    if (!id) return null;
    const record = await this.store.get('extracted_data', id);
    if (!record || record.data_type !== kind) return null;
    return record.content;
  }

  /**
   * Validate a job's extractions. A job that already has a result gets that
   * result back unchanged.
   */
  async validateJob(jobId: string): Promise<ValidationResultRecord> {
    const job = await this.getJob(jobId);

    if (job.validation_result_id) {
      const existing = await this.store.get('validation_results', job.validation_result_id);
      if (existing) {
        logger.info('Validation result already exists', { job_id: jobId, result_id: existing.id });
        return existing;
      }
    }

    const payroll = validatePayrollExtraction(await this.loadExtraction(job, 'payroll'));
    const feedback = validateFeedbackExtraction(await this.loadExtraction(job, 'feedback'));

    if (!payroll.valid || !feedback.valid) {
      const missing = [!payroll.valid ? 'payroll' : null, !feedback.valid ? 'feedback' : null]
        .filter((k): k is string => k !== null)
        .join(' and ');
      const reason = `Missing or invalid ${missing} data`;
      await this.failJob(job, reason);
      throw new MissingExtractionError(reason);
    }

    const outcome = validate(payroll.value, feedback.value, this.validationRules);
    const result = await this.store.create('validation_results', {
      id: uuidv4(),
      job_id: jobId,
      ...outcome,
    });

    await this.updateJob(jobId, transitionPatch(job, 'validated', { validation_result_id: result.id }));
    logger.info('Job validated', { job_id: jobId, status: result.status, total_issues: result.total_issues });
    return result;
  }

  async getValidationResult(jobId: string): Promise<ValidationResultRecord> {
    const job = await this.getJob(jobId);
    const result = job.validation_result_id
      ? await this.store.get('validation_results', job.validation_result_id)
      : null;
    if (!result) throw new NotFoundError(`No validation result for job ${jobId}`);
    return result;
  }

  async getValidationSummary(jobId: string): Promise<ValidationSummary> {
    const result = await this.getValidationResult(jobId);
    return summarizeIssues(result.issues);
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  /**
   * Apply reviewer resolutions. When every issue is resolved a validated job
   * moves to completed.
   */
  async resolveIssues(jobId: string, resolutions: IssueResolution[]): Promise<ResolveIssuesResponse> {
    const job = await this.getJob(jobId);
    const result = await this.getValidationResult(jobId);

    const allResolved = applyResolutions(result, resolutions);
    await this.store.update('validation_results', result.id, { issues: result.issues });

    if (allResolved && job.status === 'validated') {
      await this.updateJob(jobId, transitionPatch(job, 'completed'));
      logger.info('All issues resolved, job completed', { job_id: jobId });
    }

    return {
      message: allResolved ? 'All issues resolved' : 'Issues updated',
      all_resolved: allResolved,
    };
  }
}
