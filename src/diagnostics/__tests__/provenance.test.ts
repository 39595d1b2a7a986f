import { ProvenanceTracker } from '../provenance';

describe('ProvenanceTracker', () => {
  it('records extracted fields with their anchor and corrections', () => {
    const tracker = new ProvenanceTracker('tesseract');
    tracker.extracted('wardPhone', { anchorType: 'primary', anchorLabel: '1. WARD', corrections: ['numeric#1', 'numeric#1'] });

    expect(tracker.get('wardPhone')).toEqual({
      field: 'wardPhone',
      status: 'extracted',
      engine: 'tesseract',
      anchorType: 'primary',
      anchorLabel: '1. WARD',
      corrections: ['numeric#1'],
      split: undefined,
    });
    expect(tracker.correctionsApplied()).toEqual(['numeric#1']);
  });

  it('reports structural misses on low-confidence text as insufficient text', () => {
    const tracker = new ProvenanceTracker('gemini', true);
    tracker.missing('wardFirst', 'LABEL_NOT_FOUND', 'x');

    expect(tracker.get('wardFirst')).toMatchObject({
      status: 'missing',
      reason: 'INSUFFICIENT_TEXT',
      detail: 'LABEL_NOT_FOUND: x',
    });
  });

  it('notes an ambiguous split on the extracted entry', () => {
    const tracker = new ProvenanceTracker('text-layer');
    tracker.extracted('guardian1Name', { split: 'pair:conjunction' });
    tracker.ambiguous('guardian1Name', 'conjunction', ['comma']);

    expect(tracker.get('guardian1Name')?.detail).toBe('FIELD_AMBIGUOUS: split on conjunction, also saw comma');
  });

  it('marks every field of a missing section', () => {
    const tracker = new ProvenanceTracker(null);
    tracker.sectionMissing('guardian', ['guardian1Name', 'guardian1Phone']);

    expect(tracker.missingFields()).toEqual(['guardian1Name', 'guardian1Phone']);
    expect(tracker.get('guardian1Phone')).toMatchObject({ reason: 'SECTION_NOT_FOUND', detail: 'guardian section' });
  });
});
