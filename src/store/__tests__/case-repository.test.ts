/**
 * Row mapping between case records and the case_records table
 */

import { CaseRecord, emptyFieldStatus, emptyFields } from '../../types';
import { OWNED_COLUMNS, columnFor, recordToRow, rowToRecord } from '../case-repository';

describe('columnFor', () => {
  it('maps field keys to snake_case columns', () => {
    expect(columnFor('wardFirst')).toBe('ward_first');
    expect(columnFor('guardian1Name')).toBe('guardian1_name');
    expect(columnFor('dateArpFiled')).toBe('date_arp_filed');
  });

  it('lists only the columns this system owns', () => {
    expect(OWNED_COLUMNS).toContain('cause_number');
    expect(OWNED_COLUMNS).toContain('guardian2_relationship');
    expect(OWNED_COLUMNS).not.toContain('visit_date');
  });
});

describe('row mapping', () => {
  it('writes empty fields as null', () => {
    const record: CaseRecord = {
      causeNumber: '24-001234',
      fields: { ...emptyFields(), wardFirst: 'Jane' },
      fieldStatus: { ...emptyFieldStatus(), wardFirst: 'extracted' },
      needsReview: false,
      reviewReasons: [],
      lastEngine: 'tesseract',
      lowConfidence: false,
      updatedAt: '2025-08-01T12:00:00.000Z',
    };

    const row = recordToRow(record);

    expect(row.cause_number).toBe('24-001234');
    expect(row.ward_first).toBe('Jane');
    expect(row.ward_last).toBeNull();
    expect(row.last_engine).toBe('tesseract');
    expect(rowToRecord(row)).toEqual(record);
  });

  it('reads a row written by other tools', () => {
    const record = rowToRecord({
      cause_number: '24-005678',
      ward_last: 'Hall',
      guardian1_name: 'Karen Hall',
      field_status: { guardian1Name: 'verified', wardLast: 'bogus' },
      review_reasons: ['MISSING_CAUSE_NUMBER', 'SOMETHING_ELSE'],
      last_engine: 'abacus',
      needs_review: null,
      visit_date: '08/12/2025',
      appt_confirmed: true,
    });

    expect(record.fields.wardLast).toBe('Hall');
    expect(record.fieldStatus.guardian1Name).toBe('verified');
    expect(record.fieldStatus.wardLast).toBe('extracted');
    expect(record.fieldStatus.wardFirst).toBe('missing');
    expect(record.reviewReasons).toEqual(['MISSING_CAUSE_NUMBER']);
    expect(record.lastEngine).toBeNull();
    expect(record.needsReview).toBe(false);
    expect(record.updatedAt).toBe('');
  });

  it('rejects a row without a cause number', () => {
    expect(() => rowToRecord({ ward_last: 'Hall' })).toThrow();
  });
});
