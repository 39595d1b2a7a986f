import fs from 'fs';
import { z } from 'zod';
import defaultSettings from '../../config/extraction.json';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Rule tables, anchors and thresholds for extraction.
 *
 * Loaded once per run from JSON, validated, compiled to RegExp and handed to each
 * component explicitly. Nothing here is mutated after loading.
 */

const correctionScopeSchema = z.enum([
  'global',
  'numeric',
  'date',
  'phone',
  'name',
  'address',
  'email',
  'relationship',
  'punctuation',
]);

const regexFlagsSchema = z.string().regex(/^[gimsuy]*$/, 'Invalid regular expression flags');

const correctionRuleSchema = z.object({
  scope: correctionScopeSchema,
  pattern: z.string().min(1),
  flags: regexFlagsSchema.default('g'),
  replacement: z.string(),
  description: z.string().optional(),
});

const fieldShapeSchema = z.enum(['name', 'phone', 'date', 'email', 'address', 'text']);

const fieldSpecSchema = z.object({
  labels: z.array(z.string().min(1)).min(1),
  shape: fieldShapeSchema,
  scope: correctionScopeSchema,
  maxLines: z.number().int().positive().default(1),
});

const sectionAnchorsSchema = z.object({
  primary: z.array(z.string().min(1)).min(1),
  fallback: z.array(z.string().min(1)).default([]),
});

export const extractionSettingsSchema = z.object({
  version: z.number().int(),
  cascade: z.object({
    sufficiencyThreshold: z.number().int().nonnegative(),
  }),
  anchors: z.object({
    maxEditDistance: z.number().int().nonnegative(),
    minScore: z.number().min(0).max(1),
    ward: sectionAnchorsSchema,
    guardian: sectionAnchorsSchema.extend({
      shapeLabel: z.string().min(1),
      useShapeHeuristic: z.boolean().default(true),
    }),
    endPatterns: z.array(z.string().min(1)),
    coResidencySignals: z.array(z.string().min(1)).default([]),
  }),
  fields: z.object({
    ward: z.object({
      name: fieldSpecSchema,
      address: fieldSpecSchema,
      cityStateZip: fieldSpecSchema,
      phone: fieldSpecSchema,
      dob: fieldSpecSchema,
    }),
    guardian: z.object({
      name: fieldSpecSchema,
      address: fieldSpecSchema,
      cityStateZip: fieldSpecSchema,
      phone: fieldSpecSchema,
      email: fieldSpecSchema,
      dob: fieldSpecSchema,
      relationship: fieldSpecSchema,
      secondaryRelationship: fieldSpecSchema,
    }),
    stopLabels: z.array(z.string().min(1)).default([]),
  }),
  surnameCorrection: z.object({
    maxEditDistance: z.number().int().nonnegative(),
    requireSameInitial: z.boolean().default(true),
  }),
  causeNumberHint: z.object({
    maxDigitDifference: z.number().int().nonnegative(),
  }),
  separators: z.array(z.object({ name: z.string().min(1), pattern: z.string().min(1) })).min(1),
  relationships: z.object({
    nonFamily: z.array(z.string().min(1)).default([]),
  }),
  corrections: z.array(correctionRuleSchema),
});

export type ExtractionSettings = z.infer<typeof extractionSettingsSchema>;
export type CorrectionScope = z.infer<typeof correctionScopeSchema>;
export type FieldShape = z.infer<typeof fieldShapeSchema>;

export type WardFieldKey = keyof ExtractionSettings['fields']['ward'];
export type GuardianFieldKey = keyof ExtractionSettings['fields']['guardian'];

export interface CorrectionRule {
  /** Stable identifier used in provenance, e.g. "date#2" */
  readonly id: string;
  readonly scope: CorrectionScope;
  readonly description: string;
  readonly regex: RegExp;
  readonly replacement: string;
}

export interface FieldSpec {
  readonly key: string;
  /** Matches the label at a word boundary, plus trailing ":" or "#" */
  readonly label: RegExp;
  readonly shape: FieldShape;
  readonly scope: CorrectionScope;
  readonly maxLines: number;
}

export interface SeparatorSpec {
  readonly name: string;
  readonly regex: RegExp;
}

export interface ExtractionConfig {
  readonly settings: Readonly<ExtractionSettings>;
  readonly sufficiencyThreshold: number;
  readonly corrections: readonly CorrectionRule[];
  readonly wardFields: Readonly<Record<WardFieldKey, FieldSpec>>;
  readonly guardianFields: Readonly<Record<GuardianFieldKey, FieldSpec>>;
  /** Any recognized label; a captured value ends where the next one begins */
  readonly anyLabel: RegExp;
  readonly endPatterns: readonly RegExp[];
  readonly coResidencySignals: readonly RegExp[];
  readonly separators: readonly SeparatorSpec[];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function compile(pattern: string, flags: string, where: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern in ${where}: ${pattern}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function labelSource(labels: readonly string[]): string {
  return `(?<![\\w.@-])(?:${labels.join('|')})(?![\\w@])\\s*[:#]?`;
}

function compileField(key: string, fieldSpec: z.infer<typeof fieldSpecSchema>): FieldSpec {
  return Object.freeze({
    key,
    label: compile(labelSource(fieldSpec.labels), 'i', `fields.${key}`),
    shape: fieldSpec.shape,
    scope: fieldSpec.scope,
    maxLines: fieldSpec.maxLines,
  });
}

export function parseExtractionConfig(raw: unknown): ExtractionConfig {
  const parsed = extractionSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Extraction configuration is invalid', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const settings = parsed.data;

  const scopeCounters = new Map<CorrectionScope, number>();
  const corrections = settings.corrections.map(rule => {
    const index = (scopeCounters.get(rule.scope) ?? 0) + 1;
    scopeCounters.set(rule.scope, index);
    const id = `${rule.scope}#${index}`;
    return Object.freeze({
      id,
      scope: rule.scope,
      description: rule.description ?? id,
      regex: compile(rule.pattern, rule.flags, `corrections ${id}`),
      replacement: rule.replacement,
    });
  });

  const ward = settings.fields.ward;
  const guardian = settings.fields.guardian;
  const wardFields = Object.freeze({
    name: compileField('ward.name', ward.name),
    address: compileField('ward.address', ward.address),
    cityStateZip: compileField('ward.cityStateZip', ward.cityStateZip),
    phone: compileField('ward.phone', ward.phone),
    dob: compileField('ward.dob', ward.dob),
  });
  const guardianFields = Object.freeze({
    name: compileField('guardian.name', guardian.name),
    address: compileField('guardian.address', guardian.address),
    cityStateZip: compileField('guardian.cityStateZip', guardian.cityStateZip),
    phone: compileField('guardian.phone', guardian.phone),
    email: compileField('guardian.email', guardian.email),
    dob: compileField('guardian.dob', guardian.dob),
    relationship: compileField('guardian.relationship', guardian.relationship),
    secondaryRelationship: compileField('guardian.secondaryRelationship', guardian.secondaryRelationship),
  });

  const allLabels = [
    ...Object.values(ward).flatMap(fieldSpec => fieldSpec.labels),
    ...Object.values(guardian).flatMap(fieldSpec => fieldSpec.labels),
    ...settings.fields.stopLabels,
  ];

  return Object.freeze({
    settings: deepFreeze(settings),
    sufficiencyThreshold: settings.cascade.sufficiencyThreshold,
    corrections: Object.freeze(corrections),
    wardFields,
    guardianFields,
    anyLabel: compile(labelSource(allLabels), 'i', 'fields (all labels)'),
    endPatterns: Object.freeze(settings.anchors.endPatterns.map((p, i) => compile(p, 'i', `anchors.endPatterns[${i}]`))),
    coResidencySignals: Object.freeze(
      settings.anchors.coResidencySignals.map((p, i) => compile(p, 'i', `anchors.coResidencySignals[${i}]`))
    ),
    separators: Object.freeze(
      settings.separators.map(sep => Object.freeze({ name: sep.name, regex: compile(sep.pattern, 'i', `separators.${sep.name}`) }))
    ),
  });
}

/**
 * Load the extraction configuration from a JSON file, or the bundled defaults.
 */
export function loadExtractionConfig(filePath?: string): ExtractionConfig {
  if (!filePath) {
    return parseExtractionConfig(defaultSettings);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read extraction configuration at ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const loaded = parseExtractionConfig(raw);
  logger.info({ filePath, rules: loaded.corrections.length }, 'Extraction configuration loaded');
  return loaded;
}

/**
 * Rules that apply to a scope. Dates and phones also take the digit/letter confusion rules.
 */
export function rulesForScope(config: ExtractionConfig, scope: CorrectionScope): CorrectionRule[] {
  const scopes: CorrectionScope[] = scope === 'date' || scope === 'phone' ? ['numeric', scope] : [scope];
  return config.corrections.filter(rule => scopes.includes(rule.scope));
}
