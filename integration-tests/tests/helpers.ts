/**
 * Test Helpers
 *
 * In-process stand-ins for the record store, OCR engines and workbooks, plus
 * record builders for validator tests.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import {
  studentIdFor,
  type CollectionName,
  type CollectionRecords,
  type EngineCapability,
  type EngineName,
  type EngineTier,
  type OcrEngine,
  type RecordStore,
  type SessionRecord,
  type StudentRecord,
  type TableGrid,
  type TextExtractionReport,
} from '@tutorlog/shared';

// ============================================================================
// Record store
// ============================================================================

/**
 * Keeps copies, so callers mutating a returned record do not change what is
 * stored (as with the JSONB store).
 */
export class MemoryRecordStore implements RecordStore {
  private readonly collections: { [C in CollectionName]: Map<string, CollectionRecords[C]> } = {
    jobs: new Map(),
    extracted_data: new Map(),
    validation_results: new Map(),
  };

  async create<C extends CollectionName>(
    collection: C,
    record: CollectionRecords[C]
  ): Promise<CollectionRecords[C]> {
    this.collections[collection].set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecords[C] | null> {
    const record = this.collections[collection].get(id);
    return record === undefined ? null : structuredClone(record);
  }

  async update<C extends CollectionName>(
    collection: C,
    id: string,
    patch: Partial<CollectionRecords[C]>
  ): Promise<CollectionRecords[C] | null> {
    const existing = this.collections[collection].get(id);
    if (existing === undefined) return null;
    const merged: CollectionRecords[C] = { ...existing, ...patch };
    this.collections[collection].set(id, structuredClone(merged));
    return structuredClone(merged);
  }

  count(collection: CollectionName): number {
    return this.collections[collection].size;
  }
}

// ============================================================================
// OCR engines
// ============================================================================

export interface FakeEngineOptions {
  tier?: EngineTier;
  text?: string | Error;
  table?: TableGrid | Error;
  available?: boolean;
}

const DEFAULT_TIERS: Record<EngineName, EngineTier> = {
  direct_text: 'direct',
  tesseract: 'local_ocr',
  openai_vision: 'cloud_ocr',
};

export interface FakeEngine extends OcrEngine {
  extractText: jest.Mock<Promise<string>, [string]>;
  extractTable?: jest.Mock<Promise<TableGrid>, [string, number]>;
}

export function fakeEngine(name: EngineName, options: FakeEngineOptions = {}): FakeEngine {
  const { text = '', table, available = true } = options;
  const capabilities: EngineCapability[] = table === undefined ? ['text'] : ['text', 'table'];

  const engine: FakeEngine = {
    name,
    tier: options.tier ?? DEFAULT_TIERS[name],
    description: `fake ${name}`,
    capabilities,
    isAvailable: () => available,
    extractText: jest.fn(async (_filePath: string) => {
      if (text instanceof Error) throw text;
      return text;
    }),
  };

  if (table !== undefined) {
    engine.extractTable = jest.fn(async (_filePath: string, _pageIndex: number) => {
      if (table instanceof Error) throw table;
      return table;
    });
  }

  return engine;
}

export function textReport(
  text: string,
  overrides: Partial<TextExtractionReport> = {}
): TextExtractionReport {
  return { text, engine: 'direct_text', attempts: [], used_partial_fallback: false, ...overrides };
}

// ============================================================================
// Files
// ============================================================================

/** Create a throwaway file; the cascades only check that it exists. */
export function tempFile(name: string, contents = '%PDF-1.4 placeholder'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tutorlog-'));
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents);
  return filePath;
}

export function buildWorkbook(sheets: Array<[string, unknown[][]]>): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return workbook;
}

// ============================================================================
// Records
// ============================================================================

export function student(fullName: string, tutorAssigned: string): StudentRecord {
  const space = fullName.indexOf(' ');
  return {
    id: studentIdFor(fullName),
    first_name: space === -1 ? fullName : fullName.slice(0, space),
    last_name: space === -1 ? '' : fullName.slice(space + 1),
    full_name: fullName,
    grade: '5',
    subjects: 'Math',
    caregiver_name: '',
    caregiver_phone: '',
    caregiver_email: '',
    tutor_assigned: tutorAssigned,
    status: 'active',
    case_number: '',
    tutor_start_date: '',
  };
}

export function session(
  studentName: string,
  date: string,
  hours: number,
  overrides: Partial<SessionRecord> = {}
): SessionRecord {
  return {
    student_id: studentIdFor(studentName),
    student_name: studentName,
    date,
    time_in: '03:00 PM',
    time_out: '05:00 PM',
    hours,
    goal: '',
    is_no_show: false,
    ...overrides,
  };
}

// ============================================================================
// Sample payroll text
// ============================================================================

export const PAYROLL_TEXT = [
  'Tutoring Services Payroll Report',
  'Period: 01/01/2024 - 01/31/2024',
  '',
  'Tutor ID: T001',
  'Name: Jane Smith',
  'Assignment: Math',
  'Regular Hours: 10.0',
  'Total Hours: 10.0',
  'Rate: $25.00',
  '1/15/2024 3:00 PM - 5:00 PM 2.0 hours',
  '1/16/2024 3:00 PM – 4:30 PM 1.5 hours',
  '',
  'Tutor ID: T002',
  'Name: John Doe',
  'Total Hours: 6.5',
  'Rate: $22.50',
].join('\n');
