import type { ExtractionConfig, FieldSpec } from '../config/extraction-config';
import type { ExtractedMeta, ProvenanceTracker } from '../diagnostics/provenance';
import { CaseFieldKey, ExtractedCase, GuardianIdentity, WardIdentity, emptyGuardian, emptyWard } from '../types';
import { correctSurname } from './corrections';
import { SplitResult, inferSharedSurname, mirrorSecondaryAddress, splitDualValue } from './dual-subject-splitter';
import { ExtractedField, extractField, matchesShape } from './field-extractor';
import { captionNameCandidates, chooseBestName, cleanNameCandidate, looksLikeHumanName, toTitleCase } from './name-utils';
import {
  EMAIL_PATTERN,
  PHONE_PATTERN,
  cleanAddress,
  extractCauseNumber,
  extractFiledDate,
  findAll,
  normalizeBirthDate,
  normalizePhone,
  normalizeRelationship,
} from './normalizers';
import { SectionSpan, segment } from './section-segmenter';

type GuardianSlot = 'primary' | 'secondary';

const SLOT_KEYS: Record<GuardianSlot, Record<keyof GuardianIdentity, CaseFieldKey>> = {
  primary: {
    name: 'guardian1Name',
    dob: 'guardian1Dob',
    phone: 'guardian1Phone',
    email: 'guardian1Email',
    address: 'guardian1Address',
    relationship: 'guardian1Relationship',
  },
  secondary: {
    name: 'guardian2Name',
    dob: 'guardian2Dob',
    phone: 'guardian2Phone',
    email: 'guardian2Email',
    address: 'guardian2Address',
    relationship: 'guardian2Relationship',
  },
};

const PRIMARY_GUARDIAN_KEYS = Object.values(SLOT_KEYS.primary);

/**
 * Letters and digits near every "Guardian" mention. Used to pick between OCR
 * passes of the same page: the one that reads the guardian block best wins.
 */
export function guardianSignalScore(text: string): number {
  if (!text) return 0;
  let total = 0;
  for (const m of text.matchAll(/Guardian/gi)) {
    const index = m.index ?? 0;
    const window = text.slice(Math.max(0, index - 250), index + m[0].length + 600);
    total += (window.match(/[A-Za-z0-9@]/g) || []).length;
  }
  return total > 0 ? total : (text.match(/[A-Za-z0-9@]/g) || []).length;
}

/**
 * "Do you reside with the ward? [X] YES [ ] NO"
 * Returns "Guardian" for YES (or both boxes), "" for NO, null when the question is absent.
 */
export function parseLivesWith(text: string): string | null {
  const question = /Do\s+you\s+(?:reside|live)\s+with\s+the\s+ward/i.exec(text);
  if (!question) return null;

  const window = text.slice(question.index, question.index + 250).replace(/[[(]\s*x\s*[\])]/gi, 'X');
  const checked = (word: string) => new RegExp(`\\bX\\s*${word}\\b|\\b${word}\\s*X\\b`, 'i').test(window);
  const yes = checked('YES');
  const no = checked('NO');

  if (yes) return 'Guardian';
  if (no) return '';
  return null;
}

function spanMeta(span: SectionSpan, corrections: string[] = [], split?: string): ExtractedMeta {
  return { anchorType: span.anchorType, anchorLabel: span.anchorLabel, corrections, split };
}

function acceptName(raw: string): string {
  const cleaned = toTitleCase(cleanNameCandidate(raw));
  return cleaned && looksLikeHumanName(cleaned) ? cleaned : '';
}

function joinAddress(street: string, city: string): string {
  return cleanAddress([street, city].filter(Boolean).join(', '));
}

function splitLabel(split: SplitResult): string {
  return split.kind === 'pair' ? `pair:${split.separator}` : split.kind;
}

class ArpParser {
  constructor(
    private readonly text: string,
    private readonly config: ExtractionConfig,
    private readonly tracker: ProvenanceTracker,
    private readonly referenceYear: number
  ) {}

  parse(): ExtractedCase {
    const sections = segment(this.text, this.config);
    const ward = this.parseWard(sections.ward);
    const { primary, secondary } = sections.guardian
      ? this.parseGuardians(sections.guardian, ward.last)
      : this.noGuardianSection();

    const dateArpFiled = extractFiledDate(this.text);
    if (dateArpFiled) {
      this.tracker.extracted('dateArpFiled', { anchorLabel: 'page' });
    } else {
      this.tracker.missing('dateArpFiled', 'LABEL_NOT_FOUND', 'no clerk file stamp');
    }

    return {
      documentKind: 'arp',
      causeNumber: extractCauseNumber(this.text),
      ward,
      primaryGuardian: primary,
      secondaryGuardian: secondary,
      dateArpFiled,
      dateAppointed: '',
    };
  }

  private parseWard(span: SectionSpan | undefined): WardIdentity {
    const ward = emptyWard();
    const candidates: string[] = [];
    let nameMeta: ExtractedMeta = { anchorLabel: 'caption' };
    let nameField: ExtractedField | null = null;

    if (span) {
      nameField = extractField(span.text, this.config.wardFields.name, this.config);
      const labelled = nameField ? acceptName(nameField.raw) : '';
      if (labelled && nameField) {
        candidates.push(labelled);
        nameMeta = spanMeta(span, nameField.corrections);
      }
    }
    candidates.push(...captionNameCandidates(this.text));

    const name = chooseBestName(candidates);
    if (name.first && name.last) {
      ward.first = name.first;
      ward.middle = name.middle;
      ward.last = name.last;
      this.tracker.extracted('wardFirst', nameMeta);
      this.tracker.extracted('wardLast', nameMeta);
      if (name.middle) this.tracker.extracted('wardMiddle', nameMeta);
    } else {
      const reason = !span ? 'SECTION_NOT_FOUND' : nameField ? 'VALUE_REJECTED' : 'LABEL_NOT_FOUND';
      this.tracker.missing('wardFirst', reason, nameField?.raw);
      this.tracker.missing('wardLast', reason, nameField?.raw);
    }

    if (!span) {
      this.tracker.sectionMissing('ward', ['wardPhone', 'wardDob', 'wardAddress']);
    } else {
      const fields = this.config.wardFields;
      ward.phone = this.readSingle(span, fields.phone, 'wardPhone', raw => normalizePhone(findAll(PHONE_PATTERN, raw)[0] ?? ''));
      ward.dob = this.readSingle(span, fields.dob, 'wardDob', raw => normalizeBirthDate(raw, this.referenceYear));
      ward.address = this.readWardAddress(span);
    }

    const livesWith = parseLivesWith(this.text);
    if (livesWith) {
      ward.livesWith = livesWith;
      this.tracker.extracted('livesWith', { anchorLabel: 'page' });
    } else if (livesWith === '') {
      this.tracker.missing('livesWith', 'VALUE_REJECTED', 'checkbox answered NO');
    } else {
      this.tracker.missing('livesWith', 'LABEL_NOT_FOUND');
    }

    return ward;
  }

  private readSingle(span: SectionSpan, fieldSpec: FieldSpec, key: CaseFieldKey, normalize: (raw: string) => string): string {
    const field = extractField(span.text, fieldSpec, this.config);
    if (!field) {
      this.tracker.missing(key, 'LABEL_NOT_FOUND');
      return '';
    }
    const value = field.shapeMatched ? normalize(field.raw) : '';
    if (!value) {
      this.tracker.missing(key, 'VALUE_REJECTED', field.raw);
      return '';
    }
    this.tracker.extracted(key, spanMeta(span, field.corrections));
    return value;
  }

  private readWardAddress(span: SectionSpan): string {
    const fields = this.config.wardFields;
    const street = extractField(span.text, fields.address, this.config);
    const city = extractField(span.text, fields.cityStateZip, this.config);
    if (!street && !city) {
      this.tracker.missing('wardAddress', 'LABEL_NOT_FOUND');
      return '';
    }
    const address = joinAddress(street?.raw ?? '', city?.raw ?? '');
    if (!matchesShape(address, 'address')) {
      this.tracker.missing('wardAddress', 'VALUE_REJECTED', address);
      return '';
    }
    this.tracker.extracted('wardAddress', spanMeta(span, [...(street?.corrections ?? []), ...(city?.corrections ?? [])]));
    return address;
  }

  private noGuardianSection(): { primary: null; secondary: null } {
    this.tracker.sectionMissing('guardian', PRIMARY_GUARDIAN_KEYS);
    return { primary: null, secondary: null };
  }

  private parseGuardians(
    span: SectionSpan,
    wardSurname: string
  ): { primary: GuardianIdentity | null; secondary: GuardianIdentity | null } {
    const fields = this.config.guardianFields;
    const primary = emptyGuardian();
    const secondary = emptyGuardian();

    // Names first: whether a second guardian exists decides how shared cells split
    const nameField = extractField(span.text, fields.name, this.config);
    const known = span.preAnchorName ?? '';
    let nameSplit: SplitResult | null = null;
    if (nameField) {
      nameSplit = splitDualValue(nameField.raw, {
        fieldType: 'name',
        separators: this.config.separators,
        knownSecondaryName: known !== '',
      });
      if (nameSplit.kind === 'pair') {
        nameSplit = inferSharedSurname(nameSplit);
        primary.name = acceptName(nameSplit.primary);
        secondary.name = acceptName(nameSplit.secondary);
      } else if (nameSplit.kind === 'single') {
        primary.name = acceptName(nameSplit.value);
        secondary.name = acceptName(known);
      }
    }
    if (secondary.name && secondary.name.toLowerCase() === primary.name.toLowerCase()) {
      secondary.name = '';
    }
    const hasSecondary = secondary.name !== '';

    this.readRelationships(span, primary, secondary, hasSecondary);

    const surnameFixes: Record<GuardianSlot, string[]> = { primary: [], secondary: [] };
    for (const [slot, guardian] of [['primary', primary], ['secondary', secondary]] as const) {
      if (!guardian.name) continue;
      const fix = correctSurname(guardian.name, wardSurname, this.config, {
        relationship: guardian.relationship,
        sectionText: span.text,
      });
      if (fix.corrected) {
        guardian.name = fix.value;
        surnameFixes[slot].push(`surname:${fix.from}->${fix.to}`);
      }
    }

    this.recordNames(span, nameField, nameSplit, known, primary, secondary, surnameFixes);

    this.readShared(span, fields.phone, 'phone', hasSecondary, primary, secondary, raw => normalizePhone(raw));
    this.readShared(span, fields.dob, 'dob', hasSecondary, primary, secondary, raw => normalizeBirthDate(raw, this.referenceYear));
    this.readShared(span, fields.email, 'email', hasSecondary, primary, secondary, raw =>
      (EMAIL_PATTERN.exec(raw)?.[0] ?? '').toLowerCase()
    );
    this.readGuardianAddresses(span, hasSecondary, primary, secondary);

    const present = (g: GuardianIdentity) => Object.values(g).some(value => value !== '');
    return {
      primary: present(primary) ? primary : null,
      secondary: hasSecondary || present(secondary) ? secondary : null,
    };
  }

  private recordNames(
    span: SectionSpan,
    nameField: ExtractedField | null,
    split: SplitResult | null,
    known: string,
    primary: GuardianIdentity,
    secondary: GuardianIdentity,
    surnameFixes: Record<GuardianSlot, string[]>
  ): void {
    const corrections = nameField?.corrections ?? [];
    const how = split ? splitLabel(split) : undefined;

    if (primary.name) {
      this.tracker.extracted('guardian1Name', spanMeta(span, [...corrections, ...surnameFixes.primary], how));
    } else if (!nameField) {
      this.tracker.missing('guardian1Name', 'LABEL_NOT_FOUND');
    } else {
      this.tracker.missing('guardian1Name', 'VALUE_REJECTED', split?.kind === 'unresolved' ? split.reason : nameField.raw);
    }

    if (secondary.name) {
      const secondaryHow = split?.kind === 'single' && known ? 'pre-anchor' : how;
      this.tracker.extracted('guardian2Name', spanMeta(span, [...corrections, ...surnameFixes.secondary], secondaryHow));
    }

    if (split?.kind === 'pair' && split.ambiguous) {
      this.tracker.ambiguous('guardian1Name', split.separator, split.separatorsSeen);
    }
  }

  private readRelationships(
    span: SectionSpan,
    primary: GuardianIdentity,
    secondary: GuardianIdentity,
    hasSecondary: boolean
  ): void {
    const fields = this.config.guardianFields;
    const first = extractField(span.text, fields.relationship, this.config);
    const second = hasSecondary ? extractField(span.text, fields.secondaryRelationship, this.config) : null;

    if (first) {
      let raw = first.raw;
      let how = 'single';
      if (hasSecondary && !second) {
        const split = splitDualValue(first.raw, { fieldType: 'text', separators: this.config.separators });
        if (split.kind === 'pair') {
          raw = split.primary;
          secondary.relationship = normalizeRelationship(split.secondary);
          how = splitLabel(split);
          if (secondary.relationship) {
            this.tracker.extracted('guardian2Relationship', spanMeta(span, first.corrections, how));
          }
        }
      }
      primary.relationship = normalizeRelationship(raw);
      if (primary.relationship) {
        this.tracker.extracted('guardian1Relationship', spanMeta(span, first.corrections, how));
      } else {
        this.tracker.missing('guardian1Relationship', 'VALUE_REJECTED', first.raw);
      }
    } else {
      this.tracker.missing('guardian1Relationship', 'LABEL_NOT_FOUND');
    }

    if (second) {
      secondary.relationship = normalizeRelationship(second.raw);
      if (secondary.relationship) {
        this.tracker.extracted('guardian2Relationship', spanMeta(span, second.corrections, 'label'));
      }
    }
    if (hasSecondary && !secondary.relationship) {
      this.tracker.missing('guardian2Relationship', second ? 'VALUE_REJECTED' : 'LABEL_NOT_FOUND');
    }
  }

  /**
   * Phone, DOB and email cells often hold both guardians' values. The left value
   * goes to the primary guardian and the right one to the secondary, whether or not
   * the name line gave a second name.
   */
  private readShared(
    span: SectionSpan,
    fieldSpec: FieldSpec,
    kind: 'phone' | 'dob' | 'email',
    hasSecondary: boolean,
    primary: GuardianIdentity,
    secondary: GuardianIdentity,
    normalize: (raw: string) => string
  ): void {
    const firstKey = SLOT_KEYS.primary[kind];
    const secondKey = SLOT_KEYS.secondary[kind];
    const field = extractField(span.text, fieldSpec, this.config);

    if (!field || !field.shapeMatched) {
      const reason = field ? 'VALUE_REJECTED' : 'LABEL_NOT_FOUND';
      this.tracker.missing(firstKey, reason, field?.raw);
      if (hasSecondary) this.tracker.missing(secondKey, reason, field?.raw);
      return;
    }

    const split = splitDualValue(field.raw, { fieldType: fieldSpec.shape, separators: this.config.separators });
    const how = splitLabel(split);
    const firstRaw = split.kind === 'pair' ? split.primary : split.kind === 'single' ? split.value : '';
    const secondRaw = split.kind === 'pair' ? split.secondary : '';

    primary[kind] = firstRaw ? normalize(firstRaw) : '';
    if (primary[kind]) {
      this.tracker.extracted(firstKey, spanMeta(span, field.corrections, how));
    } else {
      this.tracker.missing(firstKey, 'VALUE_REJECTED', field.raw);
    }

    secondary[kind] = secondRaw ? normalize(secondRaw) : '';
    if (secondary[kind]) {
      this.tracker.extracted(secondKey, spanMeta(span, field.corrections, how));
    } else if (hasSecondary) {
      this.tracker.missing(secondKey, 'VALUE_REJECTED', 'single value in shared cell');
    }
    if (split.kind === 'pair' && split.ambiguous) {
      this.tracker.ambiguous(firstKey, split.separator, split.separatorsSeen);
    }
  }

  private readGuardianAddresses(
    span: SectionSpan,
    hasSecondary: boolean,
    primary: GuardianIdentity,
    secondary: GuardianIdentity
  ): void {
    const fields = this.config.guardianFields;
    const street = extractField(span.text, fields.address, this.config);
    const city = extractField(span.text, fields.cityStateZip, this.config);
    const corrections = [...(street?.corrections ?? []), ...(city?.corrections ?? [])];

    if (!street && !city) {
      this.tracker.missing('guardian1Address', 'LABEL_NOT_FOUND');
      if (hasSecondary) this.tracker.missing('guardian2Address', 'LABEL_NOT_FOUND');
      return;
    }

    const streetRaw = street?.raw ?? '';
    const cityRaw = city?.raw ?? '';
    const options = { fieldType: 'address' as const, separators: this.config.separators };
    const streetSplit = splitDualValue(streetRaw, options);
    const citySplit = splitDualValue(cityRaw, options);

    let how = 'single';
    let secondAddress = '';
    if (streetSplit.kind === 'pair') {
      // Two streets under one city line share that city
      const secondCity = citySplit.kind === 'pair' ? citySplit.secondary : cityRaw;
      const firstCity = citySplit.kind === 'pair' ? citySplit.primary : cityRaw;
      primary.address = joinAddress(streetSplit.primary, firstCity);
      secondAddress = joinAddress(streetSplit.secondary, secondCity);
      how = splitLabel(streetSplit);
    } else {
      primary.address = joinAddress(streetRaw, cityRaw);
    }

    if (primary.address && matchesShape(primary.address, 'address')) {
      this.tracker.extracted('guardian1Address', spanMeta(span, corrections, how));
    } else {
      this.tracker.missing('guardian1Address', 'VALUE_REJECTED', primary.address);
      primary.address = '';
    }

    if (!hasSecondary) {
      secondary.address = secondAddress;
      if (secondary.address) this.tracker.extracted('guardian2Address', spanMeta(span, corrections, how));
      return;
    }
    const mirrored = mirrorSecondaryAddress(primary.address, secondAddress, span.text, this.config);
    secondary.address = mirrored.value;
    if (secondary.address) {
      this.tracker.extracted('guardian2Address', spanMeta(span, corrections, mirrored.mirrored ? 'mirrored' : how));
    } else {
      this.tracker.missing('guardian2Address', 'VALUE_REJECTED', 'no second address and no co-residency signal');
    }
  }
}

/**
 * Parse normalized ARP page text into ward and guardian identities.
 * Birth years after `now` are not accepted.
 */
export function parseArp(
  text: string,
  config: ExtractionConfig,
  tracker: ProvenanceTracker,
  now: Date = new Date()
): ExtractedCase {
  return new ArpParser(text, config, tracker, now.getFullYear()).parse();
}
