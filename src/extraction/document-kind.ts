import type { DocumentKind } from '../types';

/**
 * Classify from the file name. Approvals are recognized first so "Approved Order" is skipped.
 */
export function classifyByName(fileName: string): DocumentKind {
  const name = fileName.toLowerCase();
  if (/approv(?:al|als|ed)/.test(name)) return 'approval';
  if (/(?:^|[^a-z])order(?:[^a-z]|$)/.test(name)) return 'order';
  if (/(?:^|[^a-z])arp(?:[^a-z]|$)|annual\s*report|placement/.test(name)) return 'arp';
  return 'unknown';
}

/**
 * Classify from page text when the file name says nothing.
 */
export function classifyByContent(text: string): DocumentKind {
  if (/GUARDIAN\s*\(s\)|\b1\.\s*WARD\b|Application\s+for\s+Review|Annual\s+Report/i.test(text)) return 'arp';
  if (/\bORDER\b/.test(text) && /\bSigned\b|\bJudge\b/i.test(text)) return 'order';
  return 'unknown';
}

export function classifyDocument(fileName: string, text = ''): DocumentKind {
  const byName = classifyByName(fileName);
  return byName !== 'unknown' ? byName : classifyByContent(text);
}
