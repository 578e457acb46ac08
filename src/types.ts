export const EVENT_ATTRIBUTES = [
  'type',
  'value',
  'module',
  'function',
  'path',
  'package',
  'message',
  'logger',
  'level',
  'culprit',
  'transaction'
] as const;

export type AttributeName = (typeof EVENT_ATTRIBUTES)[number];

const ATTRIBUTE_SET: ReadonlySet<string> = new Set(EVENT_ATTRIBUTES);

export function isAttributeName(name: string): name is AttributeName {
  return ATTRIBUTE_SET.has(name);
}

/**
 * Attributes extracted from one error event. Keys outside {@link EVENT_ATTRIBUTES}
 * may be present but are never read by the engine.
 */
export type EventAttributes = Readonly<Partial<Record<AttributeName, string>> & Record<string, string | undefined>>;

export type MatcherDefinition = [attribute: string, pattern: string];

export interface RawFingerprintRule {
  matchers: MatcherDefinition[];
  fingerprint: string[];
  attributes?: Record<string, string>;
}

export interface RawFingerprintingConfig {
  version: number;
  rules: RawFingerprintRule[];
}

export type TemplateToken =
  | { kind: 'literal'; value: string }
  | { kind: 'placeholder'; name: string };

export type PatternPredicate = (value: string) => boolean;

export interface CompiledMatcher {
  attribute: string;
  pattern: string;
  test: PatternPredicate;
}

export interface CompiledRule {
  index: number;
  matchers: readonly CompiledMatcher[];
  fingerprint: readonly TemplateToken[];
  attributes: Readonly<Record<string, string>>;
  text: string;
}

export interface FingerprintingConfig {
  version: number;
  rules: readonly CompiledRule[];
  source: string | null;
}

export type ComponentVariant = {
  type: 'component';
  contributes: boolean;
  contributesToSimilarity: boolean;
  hint?: string;
};

export type CustomFingerprintVariant = {
  type: 'custom-fingerprint';
  contributes: true;
  values: string[];
  matchedRule: string;
};

export type GroupingVariant = ComponentVariant | CustomFingerprintVariant;

export type VariantMap = Readonly<Record<string, GroupingVariant>>;

export interface MatchedRuleInfo {
  index: number;
  text: string;
  attributes: Readonly<Record<string, string>>;
}

export interface GroupingResult {
  fingerprint: string[];
  variants: VariantMap;
  matchedRule: MatchedRuleInfo | null;
  configVersion: number;
}
