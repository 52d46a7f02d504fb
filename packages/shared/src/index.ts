/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export * from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractDocumentsJob,
  type ValidateJobJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  engineAttemptsCounter,
  extractionDurationHistogram,
  validationIssuesCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validatePayrollExtraction,
  validateFeedbackExtraction,
  validateResolutionRequest,
  validateCreateJobRequest,
  type SchemaCheck,
} from './schemas';

// OCR engines
export * from './engines';

// Extraction cascades
export { recordAttempt, failuresOf, type EngineAttempt } from './extraction/attempts';
export {
  TextExtractor,
  type TextExtractorOptions,
  type TextExtractionReport,
} from './extraction/text-extractor';
export { TableExtractor, type TableExtractorOptions } from './extraction/table-extractor';

// Document parsers
export {
  cellText,
  isEmptyCell,
  parseDateCell,
  parseClockTime,
  parseTimeCell,
  parseHoursCell,
  isTruthyNoShow,
  type ParseOutcome,
} from './parsers/cells';
export {
  OVERVIEW_COLUMNS,
  SESSION_COLUMNS,
  NO_SHOW_MARKERS,
  OVERVIEW_SHEET_ALIASES,
  normalizeHeader,
  resolveColumn,
  matchingColumns,
} from './parsers/columns';
export { normalizeStudentName, studentIdFor } from './parsers/student-id';
export {
  parsePayroll,
  parsePayrollDetailed,
  extractPayroll,
  type PayrollParseResult,
  type PayrollTextSource,
} from './parsers/payroll';
export {
  statusFromColor,
  parseOverviewSheet,
  parseSessionSheet,
  parseFeedback,
  readWorkbook,
  extractFeedback,
} from './parsers/feedback';

// Validation
export {
  DEFAULT_VALIDATION_RULES,
  resolveRules,
  type ValidationRules,
} from './validation/rules';
export { severityFor, createIssue } from './validation/severity';
export { parseSessionDate, isoWeekKey, monthKey, type CalendarDate } from './validation/calendar';
export { checkTutorHours } from './validation/checks/tutor-hours';
export { checkWorkingHours } from './validation/checks/working-hours';
export { checkWeeklyHours } from './validation/checks/weekly-hours';
export { checkNoShows } from './validation/checks/no-shows';
export { validate, computeTotals } from './validation/validator';
export { summarizeIssues } from './validation/summary';
export {
  allIssuesResolved,
  isReadyForGeneration,
  applyResolutions,
} from './validation/resolution';

// Jobs
export {
  TRANSITIONS,
  canTransition,
  isTerminal,
  assertTransition,
  transitionPatch,
} from './jobs/status';
export {
  ProcessingService,
  type ProcessingServiceDeps,
  type ExtractionFailure,
  type ExtractionRunResult,
} from './jobs/processing-service';

// Record store
export {
  COLLECTIONS,
  type CollectionName,
  type CollectionRecords,
  type RecordStore,
} from './store/types';
export { PgRecordStore } from './store/pg-store';
