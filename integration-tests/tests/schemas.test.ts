/**
 * Contract and transcription shape tests
 */

import {
  validateCreateJobRequest,
  validateResolutionRequest,
  validatePayrollExtraction,
  validateFeedbackExtraction,
  parseTranscription,
  OpenAiVisionEngine,
  bundledLangPath,
} from '@tutorlog/shared';

const PAYROLL = {
  period: '01/01/2024 - 01/31/2024',
  tutors: [
    {
      id: 'T001',
      name: 'Jane Smith',
      total_hours: 10,
      sessions: [{ date: '01/15/2024', clock_in: '03:00 PM', clock_out: '05:00 PM', hours: 2 }],
    },
  ],
  warnings: [],
  source_file: 'payroll-jan.pdf',
  extraction_date: '2024-02-01T09:30:00.000Z',
  text_engine: 'direct_text',
};

describe('validatePayrollExtraction', () => {
  it('accepts a complete extraction', () => {
    expect(validatePayrollExtraction(PAYROLL)).toEqual({ valid: true, value: PAYROLL });
  });

  it('accepts a null period and engine', () => {
    expect(validatePayrollExtraction({ ...PAYROLL, period: null, text_engine: null }).valid).toBe(true);
  });

  it('lists every problem', () => {
    const result = validatePayrollExtraction({
      ...PAYROLL,
      tutors: [{ id: 'T002', sessions: [] }],
      text_engine: 'magic',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toContain("/tutors/0: must have required property 'name'");
      expect(result.errors).toContain('/text_engine: must be equal to one of the allowed values');
    }
  });
});

describe('validateFeedbackExtraction', () => {
  it('rejects null', () => {
    expect(validateFeedbackExtraction(null).valid).toBe(false);
  });
});

describe('request bodies', () => {
  it('accepts a job request', () => {
    const body = {
      month: 'January',
      year: 2024,
      files: [{ kind: 'payroll', path: '/uploads/p.pdf', mime_type: 'application/pdf', original_filename: 'p.pdf' }],
    };

    expect(validateCreateJobRequest(body)).toEqual({ valid: true, value: body });
  });

  it('rejects unknown file kinds and empty file lists', () => {
    const unknownKind = validateCreateJobRequest({
      month: 'January',
      year: 2024,
      files: [{ kind: 'invoice', path: '/x', mime_type: 'text/plain', original_filename: 'x' }],
    });
    const noFiles = validateCreateJobRequest({ month: 'January', year: 2024, files: [] });

    expect(unknownKind).toEqual({
      valid: false,
      errors: ['/files/0/kind: must be equal to one of the allowed values'],
    });
    expect(noFiles).toEqual({ valid: false, errors: ['/files: must NOT have fewer than 1 items'] });
  });

  it('requires integer issue ids and a resolution note', () => {
    expect(validateResolutionRequest({ resolutions: [{ issue_id: 0, resolution: 'ok' }] }).valid).toBe(true);

    const result = validateResolutionRequest({ resolutions: [{ issue_id: 1.5, resolution: '' }] });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toContain('/resolutions/0/issue_id: must be integer');
      expect(result.errors).toContain('/resolutions/0/resolution: must NOT have fewer than 1 characters');
    }
  });
});

describe('parseTranscription', () => {
  it('reads lines and positioned table cells', () => {
    const content = JSON.stringify({
      lines: ['Tutor ID: T001', 'Name: Jane Smith'],
      tables: [{ page_number: 1, cells: [{ row_index: 1, column_index: 1, text: 'Name' }] }],
    });

    expect(parseTranscription(content)).toEqual({
      lines: ['Tutor ID: T001', 'Name: Jane Smith'],
      tables: [{ page_number: 1, cells: [{ row_index: 1, column_index: 1, text: 'Name' }] }],
    });
  });

  it('rejects replies that do not match the shape', () => {
    expect(() => parseTranscription(JSON.stringify({ lines: [1, 2], tables: [] }))).toThrow(
      'OpenAI transcription did not match the expected shape'
    );
    expect(() => parseTranscription('not json')).toThrow(SyntaxError);
  });
});

describe('OpenAiVisionEngine', () => {
  it('is available only with an API key', () => {
    expect(new OpenAiVisionEngine({ apiKey: '' }).isAvailable()).toBe(false);
    expect(new OpenAiVisionEngine({ apiKey: 'test-secret' }).isAvailable()).toBe(true);
  });
});

describe('bundledLangPath', () => {
  it('points Tesseract at the traineddata installed from npm', () => {
    expect(bundledLangPath('eng')).toMatch(/node_modules[\\/]@tesseract\.js-data[\\/]eng[\\/]4\.0\.0_best_int$/);
  });
});
