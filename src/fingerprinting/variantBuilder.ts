import type {
  CompiledRule,
  ComponentVariant,
  CustomFingerprintVariant,
  GroupingVariant,
  VariantMap
} from '../types.js';

export const APP_VARIANT = 'app';
export const SYSTEM_VARIANT = 'system';
export const CUSTOM_FINGERPRINT_VARIANT = 'custom-fingerprint';

export const PRECEDENCE_HINT = 'custom fingerprint takes precedence';

function componentVariant(overridden: boolean): ComponentVariant {
  if (!overridden) {
    return { type: 'component', contributes: true, contributesToSimilarity: true };
  }
  return {
    type: 'component',
    contributes: false,
    contributesToSimilarity: true,
    hint: PRECEDENCE_HINT
  };
}

export function buildVariants(rule: CompiledRule | null, fingerprint: readonly string[]): VariantMap {
  const variants: Record<string, GroupingVariant> = {
    [APP_VARIANT]: componentVariant(rule !== null),
    [SYSTEM_VARIANT]: componentVariant(rule !== null)
  };

  if (rule) {
    const custom: CustomFingerprintVariant = {
      type: 'custom-fingerprint',
      contributes: true,
      values: [...fingerprint],
      matchedRule: rule.text
    };
    variants[CUSTOM_FINGERPRINT_VARIANT] = custom;
  }

  return variants;
}

export function contributingVariants(variants: VariantMap): string[] {
  return Object.entries(variants)
    .filter(([, variant]) => variant.contributes)
    .map(([name]) => name);
}
