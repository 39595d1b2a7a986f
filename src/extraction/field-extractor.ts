import type { ExtractionConfig, FieldShape, FieldSpec } from '../config/extraction-config';
import { correctForScope, stripStrayPunctuation } from './corrections';
import { DATE_PATTERN, EMAIL_PATTERN, PHONE_PATTERN } from './normalizers';

export interface ExtractedField {
  /** Corrected raw run, not yet split or normalized */
  raw: string;
  /** Offset of the label inside the span */
  labelIndex: number;
  /** Ids of the correction rules that fired */
  corrections: string[];
  /** False when no captured line had the expected shape; `raw` is then the first non-empty capture */
  shapeMatched: boolean;
}

// Lines looked at past the label's own line when its value is empty or malformed
const LOOKAHEAD_LINES = 2;

const MONTH_DATE = /\b[A-Za-z]{3,9}\.?\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}\b/;

export function matchesShape(value: string, shape: FieldShape): boolean {
  switch (shape) {
    case 'phone':
      return PHONE_PATTERN.test(value);
    case 'date':
      return DATE_PATTERN.test(value) || MONTH_DATE.test(value);
    case 'email':
      return EMAIL_PATTERN.test(value);
    case 'address':
      return /\d/.test(value) && /[A-Za-z]{2}/.test(value);
    case 'name':
      return /[A-Za-z]{2}/.test(value) && !/\d{3}/.test(value) && !value.includes('@');
    case 'text':
      return /[A-Za-z]{2}/.test(value);
  }
}

/** Cut a line at the first recognized label in it */
function untilNextLabel(line: string, config: ExtractionConfig): string {
  const next = new RegExp(config.anyLabel.source, 'gi').exec(line);
  return next ? line.slice(0, next.index) : line;
}

function startsWithLabel(line: string, config: ExtractionConfig): boolean {
  const next = new RegExp(config.anyLabel.source, 'i').exec(line.trimStart());
  return next !== null && next.index === 0;
}

function clean(value: string, fieldSpec: FieldSpec, config: ExtractionConfig): { value: string; fired: string[] } {
  const scoped = correctForScope(value.trim(), config, fieldSpec.scope);
  const stripped = stripStrayPunctuation(scoped.value, config);
  return { value: stripped.value.trim(), fired: [...scoped.fired, ...stripped.fired] };
}

/**
 * Capture one field's raw value from a section span.
 *
 * The value runs from the label to the next recognized label or the end of the
 * line. When that is empty or the wrong shape, the following lines are tried.
 * Addresses gather up to `maxLines` lines. Returns null when the label is absent
 * or nothing follows it.
 */
export function extractField(spanText: string, fieldSpec: FieldSpec, config: ExtractionConfig): ExtractedField | null {
  const label = new RegExp(fieldSpec.label.source, 'i').exec(spanText);
  if (!label) return null;

  const labelIndex = label.index;
  const after = spanText.slice(labelIndex + label[0].length);
  const [firstLine, ...nextLines] = after.split('\n');

  const lines = [untilNextLabel(firstLine, config)];
  for (const line of nextLines.slice(0, Math.max(LOOKAHEAD_LINES, fieldSpec.maxLines - 1))) {
    if (startsWithLabel(line, config)) break;
    lines.push(untilNextLabel(line, config));
  }

  if (fieldSpec.shape === 'address' && fieldSpec.maxLines > 1) {
    const taken = lines
      .map(line => line.trim())
      .filter(Boolean)
      .slice(0, fieldSpec.maxLines);
    if (taken.length === 0) return null;
    const { value, fired } = clean(taken.join(', '), fieldSpec, config);
    if (!value) return null;
    return { raw: value, labelIndex, corrections: fired, shapeMatched: matchesShape(value, fieldSpec.shape) };
  }

  let fallback: ExtractedField | null = null;
  for (const line of lines) {
    if (!line.trim()) continue;
    const { value, fired } = clean(line, fieldSpec, config);
    if (!value) continue;
    if (matchesShape(value, fieldSpec.shape)) {
      return { raw: value, labelIndex, corrections: fired, shapeMatched: true };
    }
    if (!fallback) fallback = { raw: value, labelIndex, corrections: fired, shapeMatched: false };
  }

  return fallback;
}
