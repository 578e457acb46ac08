import type { EventAttributes, TemplateToken } from '../types.js';
import { TemplateSyntaxError } from './errors.js';
import { resolveAttribute } from './event.js';

const PLACEHOLDER = /^\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}$/;

export function parseTemplateToken(raw: string): TemplateToken {
  const match = PLACEHOLDER.exec(raw);
  if (match) {
    return { kind: 'placeholder', name: match[1] };
  }
  if (raw.startsWith('{{') || raw.endsWith('}}')) {
    throw new TemplateSyntaxError(raw, 'placeholders must look like "{{ name }}"');
  }
  return { kind: 'literal', value: raw };
}

export function parseTemplate(tokens: readonly string[]): TemplateToken[] {
  return tokens.map(token => parseTemplateToken(token));
}

export function formatTemplateToken(token: TemplateToken): string {
  return token.kind === 'placeholder' ? `{{ ${token.name} }}` : token.value;
}

export function fallbackValue(name: string) {
  return `<no-${name}>`;
}

/**
 * Resolves every token in order. A placeholder whose attribute is absent (or not
 * a recognized attribute) renders as `<no-{name}>` in the same position.
 */
export function renderFingerprint(template: readonly TemplateToken[], event: EventAttributes): string[] {
  return template.map(token => {
    if (token.kind === 'literal') {
      return token.value;
    }
    return resolveAttribute(event, token.name) ?? fallbackValue(token.name);
  });
}

export function missingPlaceholders(template: readonly TemplateToken[], event: EventAttributes): string[] {
  const missing: string[] = [];
  for (const token of template) {
    if (token.kind === 'placeholder' && typeof resolveAttribute(event, token.name) === 'undefined') {
      missing.push(token.name);
    }
  }
  return missing;
}
