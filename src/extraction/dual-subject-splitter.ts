import type { ExtractionConfig, FieldShape, SeparatorSpec } from '../config/extraction-config';
import { DATE_PATTERN, EMAIL_PATTERN, PHONE_PATTERN, ZIP_PATTERN, findAll, looksLikeTwoAddresses } from './normalizers';

/**
 * Decides whether one handwritten cell holds one person's value or two.
 * Pure: no I/O, no logging, no configuration lookups beyond what is passed in.
 */

export interface SingleValue {
  kind: 'single';
  value: string;
}

export interface SplitPair {
  kind: 'pair';
  primary: string;
  secondary: string;
  /** Separator name from configuration, or "shape" when split on value shape */
  separator: string;
  /** Other separator types were also present; the highest-priority one was used */
  ambiguous: boolean;
  separatorsSeen: string[];
  /** Punctuation sat directly against the separator ("Kar; and Derek") */
  adjacentPunctuation: boolean;
}

export interface Unresolved {
  kind: 'unresolved';
  raw: string;
  reason: string;
}

export type SplitResult = SingleValue | SplitPair | Unresolved;

export interface SplitOptions {
  fieldType: FieldShape;
  separators: readonly SeparatorSpec[];
  /** The secondary guardian's name was already found through another anchor */
  knownSecondaryName?: boolean;
}

const SHAPES: Partial<Record<FieldShape, RegExp>> = {
  date: DATE_PATTERN,
  phone: PHONE_PATTERN,
  email: EMAIL_PATTERN,
};

const SEPARATOR_DEBRIS_END = /[\s;,/&+]+$/;
const SEPARATOR_DEBRIS_START = /^[\s;,/&+]+/;
const EDGE_PUNCTUATION = /^[\s,;:.\-]+|[\s,;:\-]+$/g;

function tidy(value: string): string {
  return value.replace(EDGE_PUNCTUATION, '').replace(/\s+/g, ' ');
}

function single(value: string): SingleValue {
  return { kind: 'single', value: tidy(value) };
}

function splitAtZip(value: string): SplitResult | null {
  const zip = new RegExp(ZIP_PATTERN.source).exec(value);
  if (!zip) return null;
  const cut = zip.index + zip[0].length;
  const primary = tidy(value.slice(0, cut));
  const secondary = tidy(value.slice(cut).replace(SEPARATOR_DEBRIS_START, ''));
  if (!primary || !secondary) return null;
  return { kind: 'pair', primary, secondary, separator: 'zip', ambiguous: false, separatorsSeen: [], adjacentPunctuation: false };
}

export function splitDualValue(raw: string, options: SplitOptions): SplitResult {
  const value = (raw || '').trim();
  if (!value) return { kind: 'single', value: '' };

  if (options.fieldType === 'name' && options.knownSecondaryName) {
    return single(value);
  }

  const shape = SHAPES[options.fieldType];
  if (shape) {
    const tokens = findAll(shape, value);
    if (tokens.length >= 2) {
      return {
        kind: 'pair',
        primary: tokens[0],
        secondary: tokens[1],
        separator: 'shape',
        ambiguous: tokens.length > 2,
        separatorsSeen: [],
        adjacentPunctuation: false,
      };
    }
    return single(tokens.length === 1 ? tokens[0] : value);
  }

  let separators = options.separators;
  if (options.fieldType === 'address') {
    if (!looksLikeTwoAddresses(value)) return single(value);
    // Commas belong to the address itself
    separators = separators.filter(sep => sep.name !== 'comma');
  }

  for (const separator of separators) {
    const match = new RegExp(separator.regex.source, 'i').exec(value);
    if (!match) continue;

    const rawLeft = value.slice(0, match.index);
    const rawRight = value.slice(match.index + match[0].length);
    const leftDebris = SEPARATOR_DEBRIS_END.exec(rawLeft)?.[0] ?? '';
    const rightDebris = SEPARATOR_DEBRIS_START.exec(rawRight)?.[0] ?? '';
    const adjacentPunctuation = /\S/.test(leftDebris + rightDebris);

    const primary = tidy(rawLeft.slice(0, rawLeft.length - leftDebris.length));
    const secondary = tidy(rawRight.slice(rightDebris.length));

    if (!primary || !secondary) {
      return { kind: 'unresolved', raw: value, reason: `separator "${separator.name}" leaves an empty side` };
    }

    // "Hall, Sarah" is one person written last-name first
    if (options.fieldType === 'name' && separator.name === 'comma' && !/\s/.test(primary) && !/\s/.test(secondary)) {
      return single(value);
    }

    const rest = `${primary} ${secondary}`;
    const separatorsSeen = separators
      .filter(other => other.name !== separator.name && new RegExp(other.regex.source, 'i').test(rest))
      .map(other => other.name);

    return {
      kind: 'pair',
      primary,
      secondary,
      separator: separator.name,
      ambiguous: separatorsSeen.length > 0,
      separatorsSeen,
      adjacentPunctuation,
    };
  }

  if (options.fieldType === 'address') {
    const byZip = splitAtZip(value);
    if (byZip) return byZip;
  }

  return single(value);
}

/**
 * "Michael & Joslyn Smith": a bare conjunction between a lone first name and a full
 * name means both share the surname. Punctuation against the separator means two
 * separately written entries, so nothing is borrowed.
 */
export function inferSharedSurname(pair: SplitPair): SplitPair {
  if (pair.separator !== 'conjunction' || pair.adjacentPunctuation) return pair;
  const left = pair.primary.split(/\s+/).filter(Boolean);
  const right = pair.secondary.split(/\s+/).filter(Boolean);
  if (left.length !== 1 || right.length < 2) return pair;
  return { ...pair, primary: `${left[0]} ${right[right.length - 1]}` };
}

export interface MirrorResult {
  value: string;
  mirrored: boolean;
}

/**
 * Copy the primary guardian's address to the secondary only on an explicit
 * co-residency signal. Never overwrites a value that is already there.
 */
export function mirrorSecondaryAddress(
  primaryAddress: string,
  secondaryAddress: string,
  sectionText: string,
  config: ExtractionConfig
): MirrorResult {
  if (secondaryAddress) return { value: secondaryAddress, mirrored: false };
  if (!primaryAddress) return { value: '', mirrored: false };
  const signalled = config.coResidencySignals.some(signal => signal.test(sectionText));
  return signalled ? { value: primaryAddress, mirrored: true } : { value: '', mirrored: false };
}
