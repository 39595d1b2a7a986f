/**
 * Value normalizers for phones, dates, cause numbers, relationships and addresses.
 * Pure string functions; nothing here logs or touches configuration.
 */

export const PHONE_PATTERN = /\(?\d{3}\)?[ \-./]?\d{3}[ \-./]?\d{4}/;
export const DATE_PATTERN = /\b\d{1,2}[./-]\d{1,2}[./-]\d{2,4}\b/;
export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
export const ZIP_PATTERN = /\b\d{5}(?:-\d{4})?\b/;

const MONTH_NAMES = 'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

export function findAll(pattern: RegExp, text: string): string[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  return Array.from(text.matchAll(new RegExp(pattern.source, flags)), m => m[0]);
}

export function normalizePhone(value: string): string {
  if (!value) return '';
  let digits = value.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  return value.trim();
}

function monthFromName(name: string): number {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? 0;
}

function expandYear(year: number, digits: number): number {
  if (digits > 2) return year;
  return year < 50 ? 2000 + year : 1900 + year;
}

function formatDate(month: number, day: number, year: number): string {
  if (month < 1 || month > 12 || day < 1 || day > 31 || year < 1900 || year > 2100) return '';
  return `${String(month).padStart(2, '0')}/${String(day).padStart(2, '0')}/${year}`;
}

/**
 * Normalize a date to MM/DD/YYYY.
 * Two-digit years below 50 are read as 20xx, the rest as 19xx.
 * Unrecognized input comes back trimmed rather than dropped.
 */
export function normalizeDate(value: string): string {
  const text = (value || '').trim();
  if (!text) return '';

  let m = /(\d{1,2})[./-](\d{1,2})[./-](\d{4}|\d{2})(?!\d)/.exec(text);
  if (m) {
    const formatted = formatDate(Number(m[1]), Number(m[2]), expandYear(Number(m[3]), m[3].length));
    if (formatted) return formatted;
  }

  m = new RegExp(`\\b(${MONTH_NAMES})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\s*,?\\s*(\\d{4})`, 'i').exec(text);
  if (m) {
    const formatted = formatDate(monthFromName(m[1]), Number(m[2]), Number(m[3]));
    if (formatted) return formatted;
  }

  m = new RegExp(`\\b(\\d{4})\\s+(${MONTH_NAMES})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`, 'i').exec(text);
  if (m) {
    const formatted = formatDate(monthFromName(m[2]), Number(m[3]), Number(m[1]));
    if (formatted) return formatted;
  }

  m = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+day\\s+of\\s+(${MONTH_NAMES})\\s*,?\\s*(\\d{4})`, 'i').exec(text);
  if (m) {
    const formatted = formatDate(monthFromName(m[2]), Number(m[1]), Number(m[3]));
    if (formatted) return formatted;
  }

  return text;
}

/**
 * Birth date in MM/DD/YYYY. A two-digit year takes the century that does not put the
 * birth after `referenceYear` ("6-5-45" is 1945); a written-out year after it is rejected.
 */
export function normalizeBirthDate(value: string, referenceYear: number): string {
  const text = (value || '').trim();
  const short = /(\d{1,2})[./-](\d{1,2})[./-](\d{2})(?!\d)/.exec(text);
  if (short) {
    const yy = Number(short[3]);
    const formatted = formatDate(Number(short[1]), Number(short[2]), 2000 + yy > referenceYear ? 1900 + yy : 2000 + yy);
    if (formatted) return formatted;
  }

  const normalized = normalizeDate(text);
  const year = /^\d{2}\/\d{2}\/(\d{4})$/.exec(normalized);
  if (year && Number(year[1]) > referenceYear) return '';
  return normalized;
}

/**
 * Canonical cause number "NN-NNNNNN". Accepts a C-1-PB- prefix and 5 or 6 digit tails.
 */
export function normalizeCauseNumber(value: string): string {
  if (!value) return '';
  const compact = value.replace(/\s+/g, '');
  const m = /(?:C-?1-?PB-?)?(\d{2})-?(\d{6})(?!\d)/i.exec(compact) || /(\d{2})-?(\d{5,6})/.exec(compact);
  if (!m) return compact;
  return `${m[1]}-${m[2].padStart(6, '0')}`;
}

/**
 * Find the cause number in page text.
 * The court-formatted C-1-PB number wins; a bare NN-NNNNNN away from the file stamp is next.
 */
export function extractCauseNumber(text: string): string {
  if (!text) return '';
  const flat = text.replace(/\s+/g, ' ');

  const court = /C\s*-?\s*1\s*-?\s*PB\s*-?\s*(\d{2})\s*-?\s*(\d{5,6})(?!\d)/i.exec(flat);
  if (court) return normalizeCauseNumber(`${court[1]}-${court[2]}`);

  const labelled = /Cause\s*No\.?\s*[:#]?\s*(\d{2})\s*-\s*(\d{5,6})(?!\d)/i.exec(flat);
  if (labelled) return normalizeCauseNumber(`${labelled[1]}-${labelled[2]}`);

  // The first lines usually hold a clerk's file stamp with its own numbering
  const lines = text.split('\n');
  const body = lines.length > 5 ? lines.slice(5).join(' ') : flat;
  const loose = /\b(\d{2})-(\d{6})\b/.exec(body) || /\b(\d{2})-(\d{5})\b/.exec(body);
  return loose ? normalizeCauseNumber(`${loose[1]}-${loose[2]}`) : '';
}

/**
 * Number of differing digits between two cause numbers of the same shape, or Infinity.
 */
export function causeNumberDistance(a: string, b: string): number {
  const da = a.replace(/\D/g, '');
  const db = b.replace(/\D/g, '');
  if (!da || da.length !== db.length) return Infinity;
  let diff = 0;
  for (let i = 0; i < da.length; i++) {
    if (da[i] !== db[i]) diff++;
  }
  return diff;
}

export function normalizeRelationship(value: string): string {
  if (!value) return '';
  let t = value.toLowerCase();
  t = t.replace(/mother\s*and\s*father|father\s*and\s*mother/g, 'father/mother');
  t = t.replace(/^[\s:;,.-]+/, ' ');
  t = t.replace(/[^a-z/ ]+/g, ' ').replace(/\s+/g, ' ').trim();
  if (!t) return '';

  const has = (word: string) => new RegExp(`\\b${word}\\b`).test(t);
  if (t.includes('father/mother') || (has('father') && has('mother'))) return 'Father/Mother';
  if (has('mother') || has('mom')) return 'Mother';
  if (has('father') || has('dad')) return 'Father';
  if (t.includes('public guardian')) return 'Public Guardian';
  if (has('parents?')) return 'Parent';
  if (has('sister')) return 'Sister';
  if (has('brother')) return 'Brother';
  if (has('son')) return 'Son';
  if (has('daughter')) return 'Daughter';
  if (has('grandmother') || has('grandma')) return 'Grandmother';
  if (has('grandfather') || has('grandpa')) return 'Grandfather';
  if (has('aunt')) return 'Aunt';
  if (has('uncle')) return 'Uncle';
  if (has('spouse') || has('wife') || has('husband')) return 'Spouse';
  if (has('friend')) return 'Friend';
  return value.trim().replace(/^[\s:;,.-]+/, '');
}

const LEAKED_LABEL = /\s*,?\s*(?:\d+\.\s*)?(?:GUARDIAN\(s\)|Name\(s\)|Visit\s*Date|Visit\s*Time|Cause\s*No\.?)(?![A-Za-z]).*$/i;

/**
 * Tidy an address: drop label leftovers and P.O. box notes, collapse lines, repair spacing.
 */
export function cleanAddress(raw: string): string {
  let s = (raw || '').trim();
  s = s.replace(/^\s*(?:Address|Addr\.?|Residence|Mailing\s*Address)\s*[:-]?\s*/i, '');
  s = s.replace(/\(.*?P\.?\s*O\.?\s*Box.*?\)/gi, '');
  s = s.replace(/[\r\n]+/g, ' ').replace(/\s{2,}/g, ' ');
  s = s.replace(/^(\d{1,6})([A-Za-z])/, '$1 $2');
  s = s.replace(/([a-z])([A-Z])/g, '$1 $2');
  s = s.replace(/([A-Za-z])\.\s+([A-Z]{2}\b)/g, '$1, $2');
  s = s.replace(LEAKED_LABEL, '');
  s = s.replace(/\s+,/g, ',').replace(/^[\s,.-]+|[\s,.-]+$/g, '');
  return s;
}

const STREET_WORDS = /\b(?:st|street|rd|road|dr|drive|ln|lane|ct|court|ave|avenue|blvd|boulevard|pkwy|parkway|ter|terrace|pl|place|way|loop|trail|pass|cove|cir|circle|hwy|highway)\b/gi;
const STATE_CODES = /\b(?:A[LKZR]|C[AOT]|D[EC]|F[LM]|G[AU]|HI|I[ADLN]|K[SY]|LA|M[ADEHINOPST]|N[CDEHJMVY]|O[HKR]|P[AWR]|RI|S[CD]|T[NX]|UT|V[AIT]|W[AIVY])\b/g;

/**
 * True when one cell plausibly holds two separate addresses:
 * two ZIP codes, two street words with a separator, or two state codes.
 */
export function looksLikeTwoAddresses(value: string): boolean {
  if (!value) return false;
  if (findAll(ZIP_PATTERN, value).length >= 2) return true;

  const streets = value.match(STREET_WORDS) || [];
  if (streets.length >= 2 && (value.includes(';') || value.includes(' / ') || / and /i.test(value))) return true;

  return (value.match(STATE_CODES) || []).length >= 2;
}

/**
 * Clerk stamp date on an ARP ("Filed for Record 2025 Jul 22", "Filed: 07/22/2025", ...).
 */
export function extractFiledDate(text: string): string {
  if (!text) return '';
  const stamp = '(?:Filed|Entered)(?:\\s+for\\s+Record)?\\b[\\s\\S]{0,60}?';

  const patterns = [
    new RegExp(`${stamp}(\\d{1,2}[./-]\\d{1,2}[./-]\\d{2,4})`, 'i'),
    new RegExp(`${stamp}((?:${MONTH_NAMES})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?\\s*,?\\s*\\d{4})`, 'i'),
    new RegExp(`${stamp}(\\d{4}\\s+(?:${MONTH_NAMES})\\.?\\s+\\d{1,2})`, 'i'),
    new RegExp(`(\\d{4}\\s+(?:${MONTH_NAMES})\\.?\\s+\\d{1,2})(?:st|nd|rd|th)?\\b`, 'i'),
  ];

  for (const pattern of patterns) {
    const m = pattern.exec(text);
    if (m) {
      const formatted = normalizeDate(m[1]);
      if (/^\d{2}\/\d{2}\/\d{4}$/.test(formatted)) return formatted;
    }
  }
  return '';
}

/**
 * Signed (appointment) date on a court order.
 */
export function extractOrderDate(text: string): string {
  if (!text) return '';
  const dateToken = `((?:${MONTH_NAMES})\\.?\\s+\\d{1,2}\\s*,\\s*\\d{4}|\\d{1,2}[./-]\\d{1,2}[./-]\\d{2,4})`;

  const direct = [
    new RegExp(`\\bSigned\\b\\s*:?\\s*(?:on\\s*)?${dateToken}`, 'i'),
    new RegExp(`\\bSigned\\s*on\\s*this\\s*(?:the\\s*)?(\\d{1,2}(?:st|nd|rd|th)?\\s*day\\s*of\\s*(?:${MONTH_NAMES})\\s*,?\\s*\\d{4})`, 'i'),
    new RegExp(`\\b(?:Order\\s*signed|Ordered\\s*on)\\s*:?\\s*${dateToken}`, 'i'),
  ];
  for (const pattern of direct) {
    const m = pattern.exec(text);
    if (m) return normalizeDate(m[1]);
  }

  const windowed = new RegExp(dateToken, 'i');
  const anchor = /\bSigned\b/i.exec(text);
  if (anchor) {
    const m = windowed.exec(text.slice(anchor.index, anchor.index + 250));
    if (m) return normalizeDate(m[1]);
  }

  const judge = /\b(?:Presiding\s*)?Judge\b/i.exec(text);
  if (judge) {
    const m = windowed.exec(text.slice(Math.max(0, judge.index - 400), judge.index));
    if (m) return normalizeDate(m[1]);
  }

  return '';
}
