/**
 * Person-name heuristics shared by the segmenter, the parsers and the splitter.
 */

const NEVER_NAME = new RegExp(
  [
    'check\\s*one', 'initial', 'annual', 'final', 'dates?\\s+covered', 'filed\\s*for\\s*record',
    'hospital', 'facility', 'visit\\s*date', 'visit\\s*time', 'cause\\s*no',
    'address', 'phone', 'e-?mail', '\\bage\\b', '\\bdob\\b', '^\\s*names?\\b', 'guardian', 'information',
    'relationship', '\\bward\\b', 'parents?\\b', '\\bmother\\b', '\\bfather\\b', 'grand(?:mother|father)', 'spouse',
    'must\\s*be\\s*listed', '\\bzip\\b', '\\bcity\\b', '\\bstate\\b', 'county', 'court', 'clerk', 'probate',
    '\\border\\b', '\\bestate\\b', '\\d{5}(?:-\\d{4})?\\b',
  ].join('|'),
  'i'
);

const QUALIFIERS = [
  /\bthe\s+ward\b/gi,
  /\ba\s+minor\b/gi,
  /\ban?\s+(?:adult|incapacitated(?:\s+(?:person|adult))?)\b/gi,
  /\bdeceased\b/gi,
  /\b(?:the\s+)?estate(?:\s+of)?\b/gi,
];

const STOP_AFTER_NAME = /\b(?:age|dob|address|phone|guardian|cause\s*no)\b.*$/i;

const SUFFIXES = new Set(['jr', 'jr.', 'sr', 'sr.', 'ii', 'iii', 'iv', 'v']);

const GENERIC_NAMES = new Set(['only person', 'person only', 'ward', 'incapacitated person', 'a person', 'the person']);

/**
 * 1 to 4 words of letters, no digits or symbols, at least one (single word) or two
 * capitalized tokens, no single-letter tokens, nothing that reads like a form label.
 */
export function looksLikeHumanName(value: string): boolean {
  const s = (value || '').trim();
  if (!s || NEVER_NAME.test(s)) return false;
  if (/[^A-Za-z .'\-,]/.test(s)) return false;

  const words = s.split(/\s+/).filter(Boolean);
  if (words.length < 1 || words.length > 4) return false;
  if (words.some(w => w.replace(/[.,]/g, '').length === 1)) return false;

  const titled = words.filter(w =>
    /^[A-Z][a-z]+(?:[.\-'][A-Za-z]+)?,?$/.test(w) || /^[A-Z]{2,},?$/.test(w) || /^(?:Jr\.?|Sr\.?|III|IV|V)$/i.test(w)
  ).length;

  return words.length === 1 ? titled >= 1 : titled >= 2;
}

export function stripNameQualifiers(value: string): string {
  let t = (value || '').replace(STOP_AFTER_NAME, '');
  for (const qualifier of QUALIFIERS) {
    t = t.replace(qualifier, '');
  }
  t = t.replace(/,\s*(?:an?|the)\b.*$/i, '');
  return t.replace(/\s+/g, ' ').replace(/[\s,;:-]+$/, '').replace(/^[\s,;:-]+/, '').trim();
}

function titleToken(token: string): string {
  if (token === token.toUpperCase() || token === token.toLowerCase()) {
    return token.toLowerCase().replace(/(^|[-'])([a-z])/g, (_, sep: string, ch: string) => sep + ch.toUpperCase());
  }
  return token;
}

export function toTitleCase(value: string): string {
  return value.split(/\s+/).filter(Boolean).map(titleToken).join(' ');
}

export interface PersonName {
  first: string;
  middle: string;
  last: string;
}

/**
 * Split into first/middle/last. Handles "Last, First" and trailing suffixes (Jr., III).
 */
export function splitPersonName(raw: string): PersonName {
  const s = (raw || '').replace(/\s+/g, ' ').trim();
  const empty = { first: '', middle: '', last: '' };
  if (!s || GENERIC_NAMES.has(s.toLowerCase())) return empty;

  if (s.includes(',')) {
    const [left, right] = s.split(/,(.*)/s);
    const rest = (right || '').trim().split(' ').filter(Boolean);
    if (!left.trim() || rest.length === 0) return empty;
    return {
      first: titleToken(rest[0]),
      middle: rest.slice(1).map(titleToken).join(' '),
      last: toTitleCase(left.trim()),
    };
  }

  let tokens = s.split(' ');
  if (tokens.length < 2) return empty;

  let last = tokens[tokens.length - 1];
  if (SUFFIXES.has(last.toLowerCase()) && tokens.length >= 3) {
    last = `${tokens[tokens.length - 2]} ${last}`;
    tokens = tokens.slice(0, -1);
  }

  return {
    first: titleToken(tokens[0]),
    middle: tokens.slice(1, -1).map(titleToken).join(' '),
    last: toTitleCase(last),
  };
}

/**
 * Prefer "Last, First" candidates, then the one closest to three tokens, then the longest.
 */
export function chooseBestName(candidates: string[]): PersonName {
  if (candidates.length === 0) return { first: '', middle: '', last: '' };
  const withComma = candidates.filter(c => c.includes(','));
  const pool = [...(withComma.length > 0 ? withComma : candidates)];

  pool.sort((a, b) => {
    const ta = Math.abs(a.split(/\s+/).length - 3);
    const tb = Math.abs(b.split(/\s+/).length - 3);
    return ta !== tb ? ta - tb : b.length - a.length;
  });

  return splitPersonName(pool[0]);
}

export function cleanNameCandidate(value: string): string {
  return stripNameQualifiers(value.replace(/[^\w\s'\-,.]/g, '').replace(/\s+/g, ' '));
}

/**
 * Ward-name candidates from a court caption ("In the Guardianship of ... In Probate Court").
 */
export function captionNameCandidates(text: string): string[] {
  const candidates: string[] = [];
  const push = (raw: string | undefined) => {
    if (!raw) return;
    const cleaned = cleanNameCandidate(raw);
    if (cleaned.length >= 3 && looksLikeHumanName(cleaned)) candidates.push(cleaned);
    else {
      const titled = toTitleCase(cleaned);
      if (titled.length >= 3 && looksLikeHumanName(titled)) candidates.push(titled);
    }
  };

  const nextLine = /In\s+the\s+Guardianship\s+of\s*\n\s*([^\n]+?)\s*(?:\n\s*In\s+(?:the\s+)?Probate|$)/im.exec(text);
  push(nextLine?.[1]);

  const sameLine = /(?:In\s+(?:the\s+)?)?Guardianship\s+of\s+([A-Za-z ,.'-]+?)(?:,?\s+(?:an?\s+)?incapacitated|\s+In\s+(?:the\s+)?Probate|$)/im.exec(text);
  push(sameLine?.[1]);

  const inRe = /(?:IN\s+RE|IN\s+THE\s+MATTER\s+OF)\s*:?\s*(?:THE\s+)?(?:GUARDIANSHIP\s+OF\s+)?([A-Za-z ,.'-]+?)\s*$/im.exec(text);
  push(inRe?.[1]);

  return candidates;
}
