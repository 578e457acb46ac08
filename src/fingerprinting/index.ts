export { FingerprintEngine, StaticConfigSource, serializeGroupingResult, DEFAULT_FINGERPRINT_VALUES } from './engine.js';
export type { ConfigSource, FingerprintEngineOptions, SerializedGroupingResult, SerializedVariant } from './engine.js';
export { compilePattern, compileMatcher, matches, validatePattern } from './matcher.js';
export { selectRule, ruleMatches } from './ruleEvaluator.js';
export { parseTemplate, parseTemplateToken, renderFingerprint, missingPlaceholders } from './template.js';
export {
  buildVariants,
  contributingVariants,
  APP_VARIANT,
  SYSTEM_VARIANT,
  CUSTOM_FINGERPRINT_VARIANT,
  PRECEDENCE_HINT
} from './variantBuilder.js';
export { normalizeEventAttributes, resolveAttribute } from './event.js';
export {
  ConfigValidationError,
  EventValidationError,
  PatternSyntaxError,
  TemplateSyntaxError
} from './errors.js';
export type { ConfigIssue } from './errors.js';
