/**
 * Feedback Parser Tests
 *
 * Workbooks are built in memory with SheetJS.
 */

import * as XLSX from 'xlsx';
import { parseFeedback, extractFeedback, readWorkbook, statusFromColor, NotFoundError } from '@tutorlog/shared';
import { buildWorkbook } from './helpers';

const OVERVIEW_HEADER = [
  'Student Name',
  'Grade',
  'Subjects',
  'Caretaker Name',
  'Phone Number',
  'Email Address',
  'Tutor Assigned',
  'Color Code',
  'Case #',
  'Tutor Start Date',
];

const OVERVIEW_ROWS: unknown[][] = [
  OVERVIEW_HEADER,
  ['Alice Brown', '5', 'Math', 'Carol Brown', '555-0100', 'carol@example.com', 'Jane Smith', 'Green', 1234, '1/8/2024'],
  ['Ben Lee', 7, 'Reading', '', '', '', ' Jane Smith ', 'purple', '', ''],
  ['', '3', 'Science', '', '', '', 'Jane Smith', 'Red', '', ''],
];

const SESSION_HEADER = ['Date', 'Time In', 'Time Out', 'Hours', 'Goal', 'No Show'];

function feedbackWorkbook(): XLSX.WorkBook {
  return buildWorkbook([
    ['Students', OVERVIEW_ROWS],
    [
      'Alice Brown',
      [
        SESSION_HEADER,
        ['1/15/2024', '3:00 PM', '5:00 PM', 2, 'Fractions', 'No'],
        ['2024-01-17', '15:00', '16:30', '1.5', '', ''],
        ['Jan 20', 'noon', '4:00 PM', 'two', '', 'yes'],
        [45320, '', '', 1, 'Decimals', null],
      ],
    ],
    ['Ben Lee', [['Date', 'Hours'], ['1/16/2024', 1]]],
    ['Main', [['Anything'], ['ignored']]],
    ['Ghost Kid', [SESSION_HEADER, ['1/18/2024', '4:00 PM', '5:00 PM', 1, '', '']]],
  ]);
}

describe('parseFeedback', () => {
  const parsed = parseFeedback(feedbackWorkbook());

  it('reads students from the first sheet', () => {
    expect(parsed.students).toEqual([
      {
        id: '0a00cc27',
        first_name: 'Alice',
        last_name: 'Brown',
        full_name: 'Alice Brown',
        grade: '5',
        subjects: 'Math',
        caregiver_name: 'Carol Brown',
        caregiver_phone: '555-0100',
        caregiver_email: 'carol@example.com',
        tutor_assigned: 'Jane Smith',
        status: 'active',
        case_number: '1234',
        tutor_start_date: '01/08/2024',
      },
      {
        id: 'fa7a4c85',
        first_name: 'Ben',
        last_name: 'Lee',
        full_name: 'Ben Lee',
        grade: '7',
        subjects: 'Reading',
        caregiver_name: '',
        caregiver_phone: '',
        caregiver_email: '',
        tutor_assigned: 'Jane Smith',
        status: 'unknown',
        case_number: '',
        tutor_start_date: '',
      },
    ]);
  });

  it('reads one session per dated row, keyed by the sheet name', () => {
    const alice = parsed.sessions.filter((s) => s.student_name === 'Alice Brown');

    expect(alice).toEqual([
      {
        student_id: '0a00cc27',
        student_name: 'Alice Brown',
        date: '01/15/2024',
        time_in: '03:00 PM',
        time_out: '05:00 PM',
        hours: 2,
        goal: 'Fractions',
        is_no_show: false,
      },
      {
        student_id: '0a00cc27',
        student_name: 'Alice Brown',
        date: '01/17/2024',
        time_in: '03:00 PM',
        time_out: '04:30 PM',
        hours: 1.5,
        goal: '',
        is_no_show: false,
      },
      {
        student_id: '0a00cc27',
        student_name: 'Alice Brown',
        date: 'Jan 20',
        time_in: 'noon',
        time_out: '04:00 PM',
        hours: 0,
        goal: '',
        is_no_show: true,
      },
      {
        student_id: '0a00cc27',
        student_name: 'Alice Brown',
        date: '01/29/2024',
        time_in: '',
        time_out: '',
        hours: 1,
        goal: 'Decimals',
        is_no_show: false,
      },
    ]);
  });

  it('skips overview alias sheets and sheets missing required columns', () => {
    expect(parsed.sessions.map((s) => s.student_name)).toEqual([
      'Alice Brown',
      'Alice Brown',
      'Alice Brown',
      'Alice Brown',
      'Ghost Kid',
    ]);
  });

  it('collects warnings in sheet order', () => {
    expect(parsed.warnings).toEqual([
      'Sheet "Alice Brown" row 4: unrecognized date "Jan 20"',
      'Sheet "Alice Brown" row 4: unrecognized time "noon"',
      'Sheet "Alice Brown" row 4: unrecognized hours "two", using 0',
      'Sheet "Ben Lee": missing timeIn, timeOut column(s); no sessions read',
      'Sheet "Ghost Kid" does not match any student on the overview sheet',
    ]);
  });

  it('reports a workbook without sheets', () => {
    expect(parseFeedback(XLSX.utils.book_new())).toEqual({
      students: [],
      sessions: [],
      warnings: ['Workbook has no sheets'],
    });
  });

  it('reports an overview sheet without a student column', () => {
    const result = parseFeedback(buildWorkbook([['Roster', [['Name', 'Grade'], ['Alice Brown', '5']]]]));

    expect(result.students).toEqual([]);
    expect(result.warnings).toEqual(['Overview sheet has no student name column']);
  });

  it('prefers the canonical student name column over a broader match', () => {
    const result = parseFeedback(
      buildWorkbook([
        ['Roster', [['Student ID', 'Student Name', 'Tutor Assigned'], ['S-1', 'Alice Brown', 'Jane Smith']]],
        ['Alice Brown', [SESSION_HEADER, ['1/15/2024', '3:00 PM', '4:00 PM', 1, '', '']]],
      ])
    );

    expect(result.students.map((s) => [s.full_name, s.tutor_assigned])).toEqual([['Alice Brown', 'Jane Smith']]);
    expect(result.sessions[0].student_id).toBe('0a00cc27');
    expect(result.warnings).toEqual([]);
  });

  it('numbers warning rows as they appear in the sheet, blank rows included', () => {
    const result = parseFeedback(
      buildWorkbook([
        ['Students', [['Student Name'], ['Alice Brown']]],
        [
          'Alice Brown',
          [SESSION_HEADER, ['1/15/2024', '3:00 PM', '4:00 PM', 1, '', ''], [], ['Jan 20', '3:00 PM', '4:00 PM', 1, '', '']],
        ],
      ])
    );

    expect(result.sessions).toHaveLength(2);
    expect(result.warnings).toEqual(['Sheet "Alice Brown" row 4: unrecognized date "Jan 20"']);
  });

  it('gives the same students and sessions when parsed twice', () => {
    const workbook = feedbackWorkbook();

    const first = parseFeedback(workbook);
    const second = parseFeedback(workbook);

    expect(second.students).toEqual(first.students);
    expect(second.sessions).toEqual(first.sessions);
  });

  it('links sessions to students whose names differ only in case and spacing', () => {
    const result = parseFeedback(
      buildWorkbook([
        ['Overview', [['Student'], ['alice  brown']]],
        ['ALICE BROWN', [SESSION_HEADER, ['1/15/2024', '3:00 PM', '4:00 PM', 1, '', '']]],
      ])
    );

    expect(result.students[0].id).toBe('0a00cc27');
    expect(result.sessions[0].student_id).toBe('0a00cc27');
    expect(result.warnings).toEqual([]);
  });
});

describe('statusFromColor', () => {
  it.each([
    ['green', 'active'],
    ['RED', 'terminated'],
    ['yellow', 'initial_call'],
    ['orange', 'assign_tutor'],
    ['pink', 'on_hold'],
    [' Blue ', 'language_request'],
    ['teal', 'unknown'],
    [null, 'unknown'],
  ])('maps %p to %s', (color, status) => {
    expect(statusFromColor(color)).toBe(status);
  });
});

describe('extractFeedback', () => {
  it('reports a missing workbook as not found', () => {
    expect(() => extractFeedback('/no/such/feedback.xlsx')).toThrow(NotFoundError);
    expect(() => readWorkbook('/no/such/feedback.xlsx')).toThrow('Workbook not found: /no/such/feedback.xlsx');
  });

  it('reads the workbook through the given reader', () => {
    const read = jest.fn((_filePath: string) => feedbackWorkbook());

    const extraction = extractFeedback('/uploads/feedback-jan.xlsx', read);

    expect(read).toHaveBeenCalledWith('/uploads/feedback-jan.xlsx');
    expect(extraction.source_file).toBe('feedback-jan.xlsx');
    expect(extraction.students).toHaveLength(2);
    expect(extraction.sessions).toHaveLength(5);
  });
});
