/**
 * OCR correction rules and surname reconciliation
 */

import { loadExtractionConfig } from '../../config/extraction-config';
import { correctForScope, correctSurname, normalizePageText, stripStrayPunctuation } from '../corrections';

const config = loadExtractionConfig();

describe('normalizePageText', () => {
  it('repairs a misread "Signed"', () => {
    expect(normalizePageText('S1gned on July 3, 2025', config)).toEqual({
      value: 'Signed on July 3, 2025',
      fired: ['global#11'],
    });
  });

  it('repairs a split "Cause No."', () => {
    expect(normalizePageText('Ca se No. 24-001234', config)).toEqual({
      value: 'Cause No. 24-001234',
      fired: ['global#13'],
    });
  });

  it('trims every line and collapses runs of spaces', () => {
    const result = normalizePageText('  Name:   Jane  \n\n\n  Phone: 1 ', config);

    expect(result.value).toBe('Name: Jane\nPhone: 1');
  });

  it('reports nothing when the text is already clean', () => {
    expect(normalizePageText('Cause No. 24-001234', config).fired).toEqual([]);
  });
});

describe('scoped corrections', () => {
  it('fixes letter O beside digits in dates', () => {
    expect(correctForScope('O7/22/196O', config, 'date')).toEqual({ value: '07/22/1960', fired: ['numeric#1'] });
  });

  it('strips trailing punctuation', () => {
    expect(stripStrayPunctuation('Kar;', config)).toEqual({ value: 'Kar', fired: ['punctuation#2'] });
  });

  it('strips leading punctuation', () => {
    expect(stripStrayPunctuation(': Jane', config)).toEqual({ value: 'Jane', fired: ['punctuation#1'] });
  });
});

describe('correctSurname', () => {
  it('adopts the ward spelling for a near miss', () => {
    expect(correctSurname('Randal Michael Pack', 'Park', config, { relationship: 'Son' })).toEqual({
      value: 'Randal Michael Park',
      corrected: true,
      from: 'Pack',
      to: 'Park',
    });
  });

  it('keeps the spelling for a non-family guardian', () => {
    const result = correctSurname('Randal Pack', 'Park', config, { relationship: 'Friend' });

    expect(result).toEqual({ value: 'Randal Pack', corrected: false });
  });

  it('keeps a spelling that recurs in the guardian section', () => {
    const result = correctSurname('Randal Pack', 'Park', config, {
      sectionText: 'Name(s): Randal Pack\nEmail: pack@example.com',
    });

    expect(result.corrected).toBe(false);
  });

  it('leaves an unrelated surname alone', () => {
    expect(correctSurname('Tom Smith', 'Park', config)).toEqual({ value: 'Tom Smith', corrected: false });
  });

  it('looks past a generational suffix', () => {
    expect(correctSurname('Tom Pack Jr', 'Park', config).value).toBe('Tom Park Jr');
  });
});
