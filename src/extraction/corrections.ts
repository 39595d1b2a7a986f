import { CorrectionRule, CorrectionScope, ExtractionConfig, rulesForScope } from '../config/extraction-config';
import { levenshteinDistance } from '../utils/fuzzy-matcher';

export interface CorrectedValue {
  value: string;
  /** Ids of the rules that changed the value */
  fired: string[];
}

export function applyCorrections(value: string, rules: readonly CorrectionRule[]): CorrectedValue {
  const fired: string[] = [];
  let current = value;

  for (const rule of rules) {
    const next = current.replace(rule.regex, rule.replacement);
    if (next !== current) {
      fired.push(rule.id);
      current = next;
    }
  }

  return { value: current, fired };
}

export function correctForScope(value: string, config: ExtractionConfig, scope: CorrectionScope): CorrectedValue {
  return applyCorrections(value, rulesForScope(config, scope));
}

/**
 * Strip stray leading/trailing punctuation left over from OCR (e.g. "Kar;" -> "Kar").
 */
export function stripStrayPunctuation(value: string, config: ExtractionConfig): CorrectedValue {
  return correctForScope(value, config, 'punctuation');
}

/**
 * Page-level cleanup run once on engine output, before segmentation.
 */
export function normalizePageText(text: string, config: ExtractionConfig): CorrectedValue {
  const corrected = correctForScope(text, config, 'global');
  const value = corrected.value
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .trim();
  return { value, fired: corrected.fired };
}

const NAME_SUFFIXES = new Set(['jr', 'jr.', 'sr', 'sr.', 'ii', 'iii', 'iv', 'v']);

export interface SurnameEvidence {
  /** Guardian's relationship to the ward, as extracted */
  relationship?: string;
  /** Guardian section text, used to see whether the extracted spelling recurs independently */
  sectionText?: string;
}

export interface SurnameCorrection {
  value: string;
  corrected: boolean;
  from?: string;
  to?: string;
}

/**
 * Prefer the ward's surname spelling when a guardian surname is a near miss of it.
 *
 * Applies only when the final surname token is within the configured edit distance
 * of the ward surname (same initial by default), and nothing contradicts a shared
 * surname: a non-family relationship, or the extracted spelling recurring elsewhere
 * in the guardian section.
 */
export function correctSurname(
  name: string,
  wardSurname: string,
  config: ExtractionConfig,
  evidence: SurnameEvidence = {}
): SurnameCorrection {
  const tokens = name.trim().split(/\s+/).filter(Boolean);
  const ward = wardSurname.trim();
  if (tokens.length < 2 || !ward) return { value: name, corrected: false };

  let surnameIndex = tokens.length - 1;
  if (NAME_SUFFIXES.has(tokens[surnameIndex].toLowerCase()) && surnameIndex > 1) {
    surnameIndex--;
  }
  const surname = tokens[surnameIndex];
  const a = surname.toLowerCase();
  const b = ward.toLowerCase();
  if (a === b) return { value: name, corrected: false };

  const { maxEditDistance, requireSameInitial } = config.settings.surnameCorrection;
  if (a.length < 3 || b.length < 3) return { value: name, corrected: false };
  if (requireSameInitial && a[0] !== b[0]) return { value: name, corrected: false };
  if (levenshteinDistance(a, b) > maxEditDistance) return { value: name, corrected: false };

  const relationship = (evidence.relationship || '').toLowerCase();
  if (relationship && config.settings.relationships.nonFamily.some(term => relationship.includes(term.toLowerCase()))) {
    return { value: name, corrected: false };
  }

  if (evidence.sectionText) {
    const occurrences = evidence.sectionText.match(new RegExp(`\\b${surname.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`, 'gi'));
    if (occurrences && occurrences.length > 1) {
      return { value: name, corrected: false };
    }
  }

  const next = [...tokens];
  next[surnameIndex] = ward;
  return { value: next.join(' '), corrected: true, from: surname, to: ward };
}
