/**
 * Payroll Parser
 *
 * Best-effort extraction of tutor records from payroll text. The text is cut
 * into one segment per "Tutor ID" marker and each segment is read
 * independently; fields that do not match are left unset.
 */

import path from 'path';
import type { ClockEntry, ParsedPayroll, PayrollExtraction, TutorRecord } from '../types';
import type { TextExtractionReport } from '../extraction/text-extractor';
import { logger } from '../logger';

const TUTOR_MARKER = /Tutor ID[:\s]+/;
const PERIOD = /Period[: \t]+([^\n]+)/;

const ID = /^([A-Z0-9]+)/;
const NAME = /Name[: \t]+([^\n]+)/;
const ASSIGNMENT = /Assignment[: \t]+([^\n]+)/;
const REGULAR_HOURS = /Regular Hours[:\s]+([\d.]+)/;
const TOTAL_HOURS = /Total Hours[:\s]+([\d.]+)/;
const RATE = /Rate[:\s]+\$([\d.]+)/;
const SESSION_LINE =
  /(\d{1,2}\/\d{1,2}\/\d{2,4})\s+(\d{1,2}:\d{2}\s*[AP]M)\s*[-–]\s*(\d{1,2}:\d{2}\s*[AP]M)\s+([\d.]+)\s+hours/g;

function toNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

function parseSessions(segment: string): ClockEntry[] {
  const sessions: ClockEntry[] = [];
  for (const match of segment.matchAll(SESSION_LINE)) {
    const entry: ClockEntry = { date: match[1], clock_in: match[2], clock_out: match[3] };
    const hours = toNumber(match[4]);
    if (hours !== undefined) entry.hours = hours;
    sessions.push(entry);
  }
  return sessions;
}

function parseSegment(segment: string): TutorRecord | null {
  const id = ID.exec(segment)?.[1];
  const name = NAME.exec(segment)?.[1].trim();
  if (!id || !name) return null;

  const tutor: TutorRecord = { id, name, sessions: parseSessions(segment) };

  const assignment = ASSIGNMENT.exec(segment)?.[1].trim();
  if (assignment) tutor.assignment = assignment;

  const regularHours = toNumber(REGULAR_HOURS.exec(segment)?.[1]);
  if (regularHours !== undefined) tutor.regular_hours = regularHours;

  const totalHours = toNumber(TOTAL_HOURS.exec(segment)?.[1]);
  if (totalHours !== undefined) tutor.total_hours = totalHours;

  const rate = toNumber(RATE.exec(segment)?.[1]);
  if (rate !== undefined) tutor.hourly_rate = rate;

  return tutor;
}

export interface PayrollParseResult {
  payroll: ParsedPayroll;
  warnings: string[];
}

export function parsePayrollDetailed(text: string): PayrollParseResult {
  const warnings: string[] = [];
  const period = PERIOD.exec(text)?.[1].trim() || null;
  if (period === null) warnings.push('Payroll period not found');

  const segments = text.split(TUTOR_MARKER).slice(1);
  const tutors: TutorRecord[] = [];

  segments.forEach((segment, index) => {
    const tutor = parseSegment(segment);
    if (tutor) {
      tutors.push(tutor);
    } else {
      warnings.push(`Tutor segment ${index + 1} dropped: id or name not found`);
    }
  });

  if (segments.length === 0) warnings.push('No "Tutor ID" sections found');

  return { payroll: { period, tutors }, warnings };
}

export function parsePayroll(text: string): ParsedPayroll {
  return parsePayrollDetailed(text).payroll;
}

export interface PayrollTextSource {
  extractTextWithReport(filePath: string): Promise<TextExtractionReport>;
}

/**
 * Extract text with the OCR cascade and parse it into a payroll envelope.
 */
export async function extractPayroll(
  filePath: string,
  textSource: PayrollTextSource
): Promise<PayrollExtraction> {
  const report = await textSource.extractTextWithReport(filePath);
  const { payroll, warnings } = parsePayrollDetailed(report.text);

  if (report.used_partial_fallback) {
    warnings.unshift('OCR engines failed; parsed the partial text layer');
  }

  logger.info('Payroll parsed', {
    source_file: path.basename(filePath),
    text_engine: report.engine,
    tutors: payroll.tutors.length,
    warnings: warnings.length,
  });

  return {
    ...payroll,
    warnings,
    source_file: path.basename(filePath),
    extraction_date: new Date().toISOString(),
    text_engine: report.engine,
  };
}
