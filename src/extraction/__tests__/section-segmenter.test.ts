/**
 * Locating the ward and guardian sections of an intake form
 */

import defaultSettings from '../../../config/extraction.json';
import { loadExtractionConfig, parseExtractionConfig } from '../../config/extraction-config';
import { segment } from '../section-segmenter';

const config = loadExtractionConfig();

function withAnchorTolerance(maxEditDistance: number, minScore: number) {
  return parseExtractionConfig({
    ...defaultSettings,
    anchors: { ...defaultSettings.anchors, maxEditDistance, minScore },
  });
}

describe('segment', () => {
  it('finds numbered headers and keeps the spans apart', () => {
    const text = '1. WARD\nName: Jane Park\n2. GUARDIAN(s)\nName(s): Karen Hall\n3. VISIT';
    const { ward, guardian } = segment(text, config);

    expect(ward?.anchorType).toBe('primary');
    expect(ward?.text).toBe('\nName: Jane Park');
    expect(guardian?.anchorType).toBe('primary');
    expect(guardian?.anchorLabel).toBe('2. GUARDIAN(s)');
    expect(guardian?.text).toBe('\nName(s): Karen Hall');
  });

  it('falls back to secondary headers', () => {
    const text = 'Ward Name: Tom Hall\nGuardian Information\nName(s): Karen Hall\nPhone: 512-555-0142';
    const { ward, guardian } = segment(text, config);

    expect(ward?.anchorType).toBe('fallback');
    expect(ward?.start).toBe(0);
    expect(ward?.text).toBe('Ward Name: Tom Hall\n');
    expect(guardian?.anchorType).toBe('fallback');
    expect(guardian?.anchorLabel).toBe('Guardian Information');
    expect(guardian?.text).toBe('\nName(s): Karen Hall\nPhone: 512-555-0142');
    expect(guardian?.preAnchorName).toBeUndefined();
  });

  it('opens the guardian span on a name line above "Name(s)" when no header exists', () => {
    const text = 'Karen Hall\nName(s): Derek Hall\nPhone: 512-555-0142';
    const { ward, guardian } = segment(text, config);

    expect(ward).toBeUndefined();
    expect(guardian?.anchorType).toBe('shape');
    expect(guardian?.anchorLabel).toBe('Name(s)');
    expect(guardian?.start).toBe(0);
    expect(guardian?.preAnchorName).toBe('Karen Hall');
  });

  it('does not open a guardian section on a ward line that mentions the guardian', () => {
    const text = '1. WARD\nName: Jane Park\nLives with guardian: YES';
    const { ward, guardian } = segment(text, config);

    expect(guardian).toBeUndefined();
    expect(ward?.text).toBe('\nName: Jane Park\nLives with guardian: YES');
  });

  it('prefers a misread guardian header over guardian words in the ward text', () => {
    const text = '1. WARD\nName: Jane Park\nLives with guardian: YES\n2. GUARDlAN(s)\nName(s): Karen Hall';
    const { ward, guardian } = segment(text, config);

    expect(ward?.text).toBe('\nName: Jane Park\nLives with guardian: YES');
    expect(guardian?.anchorType).toBe('primary');
    expect(guardian?.anchorLabel).toBe('2. GUARDIAN(s)');
    expect(guardian?.text).toBe('\nName(s): Karen Hall');
  });

  it('reads the anchor tolerance from configuration', () => {
    const text = '1. WARD\nName: Jane Park\n2. GUARDlAN(s)\nName: Karen Hall';

    expect(segment(text, config).guardian?.text).toBe('\nName: Karen Hall');
    expect(segment(text, withAnchorTolerance(0, 0.8)).guardian).toBeUndefined();
    expect(segment(text, withAnchorTolerance(2, 0.95)).guardian).toBeUndefined();
    expect(segment(text, withAnchorTolerance(0, 0.8)).ward?.text).toBe('\nName: Jane Park');
  });

  it('returns no sections for unrelated text', () => {
    expect(segment('lorem ipsum dolor', config)).toEqual({});
  });
});
