/**
 * Shared TypeScript Types
 *
 * Record shapes for the reconciliation pipeline, matching the JSON schemas in
 * docs/contracts/. Records are persisted as open key/value documents, so keys
 * are snake_case on the wire and in storage.
 */

// ============================================================================
// Payroll
// ============================================================================

export interface ClockEntry {
  date: string;
  clock_in: string;
  clock_out: string;
  hours?: number;
}

export interface TutorRecord {
  id: string;
  name: string;
  assignment?: string;
  regular_hours?: number;
  total_hours?: number;
  hourly_rate?: number;
  sessions: ClockEntry[];
}

export interface ParsedPayroll {
  period: string | null;
  tutors: TutorRecord[];
}

export interface PayrollExtraction extends ParsedPayroll {
  warnings: string[];
  source_file: string;
  extraction_date: string;
  /** Engine that produced the text the tutors were parsed from */
  text_engine: string | null;
}

// ============================================================================
// Feedback
// ============================================================================

export type StudentStatus =
  | 'active'
  | 'terminated'
  | 'initial_call'
  | 'assign_tutor'
  | 'on_hold'
  | 'language_request'
  | 'unknown';

export interface StudentRecord {
  id: string;
  first_name: string;
  last_name: string;
  full_name: string;
  grade: string;
  subjects: string;
  caregiver_name: string;
  caregiver_phone: string;
  caregiver_email: string;
  tutor_assigned: string;
  status: StudentStatus;
  case_number: string;
  tutor_start_date: string;
}

export interface SessionRecord {
  student_id: string;
  student_name: string;
  /** MM/DD/YYYY, or the raw cell text when it could not be parsed */
  date: string;
  /** hh:mm AM, or the raw cell text when it could not be parsed */
  time_in: string;
  time_out: string;
  hours: number;
  goal: string;
  is_no_show: boolean;
}

export interface ParsedFeedback {
  students: StudentRecord[];
  sessions: SessionRecord[];
  warnings: string[];
}

export interface FeedbackExtraction extends ParsedFeedback {
  source_file: string;
  extraction_date: string;
}

// ============================================================================
// Validation
// ============================================================================

export type IssueType =
  | 'tutor_hours_mismatch'
  | 'tutor_not_found'
  | 'tutor_missing_from_payroll'
  | 'invalid_start_time'
  | 'invalid_end_time'
  | 'unparseable_time'
  | 'excess_weekly_hours'
  | 'excess_no_shows';

/** Fine-grained level assigned by the individual checks */
export type IssueLevel = 'high' | 'medium' | 'low';

/** Coarse severity surfaced to reviewers */
export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  issue_type: IssueType;
  level: IssueLevel;
  severity: IssueSeverity;
  description: string;
  details: Record<string, unknown>;
  resolved: boolean;
  resolution_note?: string;
  corrected_value?: string;
}

export type ValidationStatus = 'valid' | 'invalid';

export interface ValidationTotals {
  total_sessions: number;
  total_students: number;
  total_tutors: number;
  total_hours: number;
}

export interface ValidationOutcome extends ValidationTotals {
  status: ValidationStatus;
  issues: ValidationIssue[];
  validation_date: string;
  total_issues: number;
}

export interface ValidationResultRecord extends ValidationOutcome {
  id: string;
  job_id: string;
}

export interface IssueResolution {
  /** Position of the issue in the stored issue list */
  issue_id: number;
  resolution: string;
  corrected_value?: string;
}

export interface ValidationSummary {
  total_issues: number;
  errors: number;
  warnings: number;
  resolved: number;
  unresolved: number;
  by_type: Record<string, number>;
  by_severity: Record<IssueSeverity, number>;
}

// ============================================================================
// Jobs
// ============================================================================

export type ProcessingStatus =
  | 'uploaded'
  | 'processing'
  | 'validated'
  | 'generating'
  | 'completed'
  | 'failed';

export type FileKind = 'payroll' | 'feedback';

export interface UploadedFile {
  id: string;
  kind: FileKind;
  path: string;
  mime_type: string;
  original_filename: string;
}

export interface ProcessingJob {
  id: string;
  month: string;
  year: number;
  status: ProcessingStatus;
  files: UploadedFile[];
  extracted_data_ids: Partial<Record<FileKind, string>>;
  validation_result_id?: string;
  failure_reason?: string;
  created_at: string;
  updated_at: string;
  completed_at?: string;
}

export interface ExtractedDataRecord {
  id: string;
  job_id: string;
  file_id: string;
  data_type: FileKind;
  content: PayrollExtraction | FeedbackExtraction;
  extracted_at: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface CreateJobRequest {
  month: string;
  year: number;
  files: Array<Omit<UploadedFile, 'id'>>;
}

export interface ResolveIssuesResponse {
  message: string;
  all_resolved: boolean;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
