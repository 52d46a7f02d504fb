/**
 * Payroll Parser Tests
 */

import { parsePayroll, parsePayrollDetailed, extractPayroll } from '@tutorlog/shared';
import { PAYROLL_TEXT, textReport } from './helpers';

describe('parsePayroll', () => {
  it('reads the period and one tutor per "Tutor ID" segment', () => {
    const payroll = parsePayroll(PAYROLL_TEXT);

    expect(payroll.period).toBe('01/01/2024 - 01/31/2024');
    expect(payroll.tutors).toEqual([
      {
        id: 'T001',
        name: 'Jane Smith',
        assignment: 'Math',
        regular_hours: 10,
        total_hours: 10,
        hourly_rate: 25,
        sessions: [
          { date: '1/15/2024', clock_in: '3:00 PM', clock_out: '5:00 PM', hours: 2 },
          { date: '1/16/2024', clock_in: '3:00 PM', clock_out: '4:30 PM', hours: 1.5 },
        ],
      },
      {
        id: 'T002',
        name: 'John Doe',
        total_hours: 6.5,
        hourly_rate: 22.5,
        sessions: [],
      },
    ]);
  });

  it('leaves missing numeric fields unset', () => {
    const payroll = parsePayroll('Tutor ID: T100\nName: Sam Green\n');

    expect(payroll.tutors).toHaveLength(1);
    expect(payroll.tutors[0]).toEqual({ id: 'T100', name: 'Sam Green', sessions: [] });
    expect(payroll.tutors[0]).not.toHaveProperty('total_hours');
  });

  it('drops segments without an uppercase id', () => {
    const result = parsePayrollDetailed('Period: March\nTutor ID: t9\nName: Low Case\n');

    expect(result.payroll.tutors).toEqual([]);
    expect(result.warnings).toEqual(['Tutor segment 1 dropped: id or name not found']);
  });

  it('only reads a name on the same line as its label', () => {
    const result = parsePayrollDetailed('Period: March\nTutor ID: T3\nName:\nBob Ray\nTotal Hours: 4\n');

    expect(result.payroll.tutors).toEqual([]);
    expect(result.warnings).toEqual(['Tutor segment 1 dropped: id or name not found']);
  });

  it('keeps later tutors when an earlier segment is dropped', () => {
    const payroll = parsePayroll('Tutor ID: ???\nName: Nobody\nTutor ID: T7\nName: Ana Ruiz\nTotal Hours: 3.25\n');

    expect(payroll.tutors.map((t) => t.id)).toEqual(['T7']);
    expect(payroll.tutors[0].total_hours).toBe(3.25);
  });

  it('reports text with no period and no tutor sections', () => {
    const result = parsePayrollDetailed('nothing useful here');

    expect(result.payroll).toEqual({ period: null, tutors: [] });
    expect(result.warnings).toEqual(['Payroll period not found', 'No "Tutor ID" sections found']);
  });
});

describe('extractPayroll', () => {
  it('wraps the parsed payroll with the engine that produced the text', async () => {
    const source = { extractTextWithReport: jest.fn(async () => textReport(PAYROLL_TEXT, { engine: 'tesseract' })) };

    const extraction = await extractPayroll('/uploads/january-payroll.pdf', source);

    expect(source.extractTextWithReport).toHaveBeenCalledWith('/uploads/january-payroll.pdf');
    expect(extraction.source_file).toBe('january-payroll.pdf');
    expect(extraction.text_engine).toBe('tesseract');
    expect(extraction.tutors).toHaveLength(2);
    expect(extraction.warnings).toEqual([]);
    expect(Number.isNaN(Date.parse(extraction.extraction_date))).toBe(false);
  });

  it('flags a result parsed from the partial text layer', async () => {
    const source = {
      extractTextWithReport: async () => textReport('Period: Jan', { used_partial_fallback: true }),
    };

    const extraction = await extractPayroll('/uploads/scan.pdf', source);

    expect(extraction.warnings).toEqual([
      'OCR engines failed; parsed the partial text layer',
      'No "Tutor ID" sections found',
    ]);
    expect(extraction.period).toBe('Jan');
  });
});
