import type { ExtractionConfig } from '../config/extraction-config';
import { AnchorMatch, AnchorSearchOptions, findAnchor } from '../utils/fuzzy-matcher';
import { cleanNameCandidate, looksLikeHumanName } from './name-utils';

export type AnchorType = 'primary' | 'fallback' | 'shape';

export interface SectionSpan {
  /** Offset just after the anchor (or the start of the pre-anchor name line) */
  start: number;
  end: number;
  anchorType: AnchorType;
  /** Configured phrase that matched, or the shape label */
  anchorLabel: string;
  /** Where the anchor itself begins; the preceding section is cut here */
  anchorStart: number;
  text: string;
  /** Name-shaped line sitting right before the "Name(s)" label */
  preAnchorName?: string;
}

export interface Segmentation {
  ward?: SectionSpan;
  guardian?: SectionSpan;
}

interface AnchorHit {
  match: AnchorMatch;
  phrase: string;
  type: AnchorType;
}

// Header remnants that can share a line with a pre-anchor name
const HEADER_PREFIX = /^\s*(?:\d+\.\s*)?(?:guardian\s*(?:\(s\)|s)?\s*(?:information)?)?\s*[:\-]?\s*/i;

function anchorOptions(config: ExtractionConfig, from: number): AnchorSearchOptions {
  return {
    maxDistance: config.settings.anchors.maxEditDistance,
    minScore: config.settings.anchors.minScore,
    from,
  };
}

function firstAnchor(
  text: string,
  phrases: readonly string[],
  type: AnchorType,
  options: AnchorSearchOptions
): AnchorHit | null {
  for (const phrase of phrases) {
    const match = findAnchor(text, phrase, options);
    if (match) return { match, phrase, type };
  }
  return null;
}

/** Skip the ":" and spacing that trail a header */
function afterAnchor(text: string, end: number): number {
  const tail = /^[ \t]*[:#\-]?[ \t]*/.exec(text.slice(end));
  return end + (tail ? tail[0].length : 0);
}

function sectionEnd(text: string, from: number, config: ExtractionConfig): number {
  const rest = text.slice(from);
  let end = text.length;
  for (const pattern of config.endPatterns) {
    const m = new RegExp(pattern.source, 'i').exec(rest);
    if (m && from + m.index < end) end = from + m.index;
  }
  return end;
}

interface PreAnchorName {
  name: string;
  lineStart: number;
}

function nameShaped(raw: string): string {
  const candidate = cleanNameCandidate(raw.replace(HEADER_PREFIX, ''));
  return candidate && looksLikeHumanName(candidate) ? candidate : '';
}

/**
 * The name-shaped text in front of a label: first on the label's own line,
 * then on the closest non-empty line above it.
 */
function preAnchorNameAt(text: string, labelStart: number): PreAnchorName | null {
  const lineStart = text.lastIndexOf('\n', labelStart - 1) + 1;
  const sameLine = nameShaped(text.slice(lineStart, labelStart));
  if (sameLine) return { name: sameLine, lineStart };

  let cursor = lineStart - 1;
  while (cursor > 0) {
    const previousStart = text.lastIndexOf('\n', cursor - 1) + 1;
    const line = text.slice(previousStart, cursor);
    if (line.trim()) {
      const name = nameShaped(line);
      return name ? { name, lineStart: previousStart } : null;
    }
    cursor = previousStart - 1;
  }
  return null;
}

/**
 * A name-shaped line immediately before the "Name(s)" label, if there is one.
 */
export function findPreAnchorName(spanText: string, config: ExtractionConfig): string | undefined {
  const label = findAnchor(spanText, config.settings.anchors.guardian.shapeLabel, anchorOptions(config, 0));
  if (!label) return undefined;
  return preAnchorNameAt(spanText, label.start)?.name;
}

function findGuardianAnchor(text: string, from: number, config: ExtractionConfig): AnchorHit | null {
  const anchors = config.settings.anchors.guardian;
  const options = anchorOptions(config, from);

  const declared =
    firstAnchor(text, anchors.primary, 'primary', options) ?? firstAnchor(text, anchors.fallback, 'fallback', options);
  if (declared || !anchors.useShapeHeuristic) return declared;

  const label = findAnchor(text, anchors.shapeLabel, options);
  if (!label) return null;
  const pre = preAnchorNameAt(text, label.start);
  if (!pre || pre.lineStart < from) return null;

  // The span opens on the name line so the name stays inside it
  return {
    match: { start: pre.lineStart, end: pre.lineStart, distance: label.distance, score: label.score, matched: pre.name },
    phrase: anchors.shapeLabel,
    type: 'shape',
  };
}

/**
 * Where a span's text begins. A header that ends in a field label ("Guardian
 * Name(s)", "Ward Name") keeps the label inside the span so the field can be read.
 */
function spanStart(text: string, hit: AnchorHit, config: ExtractionConfig): number {
  if (hit.type === 'shape') return hit.match.start;
  const label = new RegExp(config.anyLabel.source, 'i').exec(hit.match.matched);
  return label ? hit.match.start + label.index : afterAnchor(text, hit.match.end);
}

function toSpan(text: string, hit: AnchorHit, start: number, end: number): SectionSpan {
  const spanEnd = Math.max(start, end);
  return {
    start,
    end: spanEnd,
    anchorType: hit.type,
    anchorLabel: hit.phrase,
    anchorStart: hit.match.start,
    text: text.slice(start, spanEnd),
  };
}

/**
 * Locate the ward and guardian sections of a page.
 *
 * The guardian anchor is searched only past the ward header, and the ward span
 * stops where the guardian anchor begins, so the two never overlap. A missing
 * section is simply absent from the result.
 */
export function segment(text: string, config: ExtractionConfig): Segmentation {
  const anchors = config.settings.anchors;
  const result: Segmentation = {};

  const wardHit =
    firstAnchor(text, anchors.ward.primary, 'primary', anchorOptions(config, 0)) ??
    firstAnchor(text, anchors.ward.fallback, 'fallback', anchorOptions(config, 0));

  const guardianFrom = wardHit ? wardHit.match.end : 0;
  const guardianHit = findGuardianAnchor(text, guardianFrom, config);

  if (guardianHit) {
    const start = spanStart(text, guardianHit, config);
    const guardian = toSpan(text, guardianHit, start, sectionEnd(text, start, config));
    const preAnchorName = findPreAnchorName(guardian.text, config);
    if (preAnchorName) guardian.preAnchorName = preAnchorName;
    result.guardian = guardian;
  }

  if (wardHit) {
    const start = spanStart(text, wardHit, config);
    let end = sectionEnd(text, start, config);
    if (guardianHit && guardianHit.match.start >= start && guardianHit.match.start < end) {
      end = guardianHit.match.start;
    }
    result.ward = toSpan(text, wardHit, start, end);
  }

  return result;
}
