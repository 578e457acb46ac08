import { isAttributeName, type AttributeName, type EventAttributes } from '../types.js';
import { EventValidationError } from './errors.js';

/**
 * Accepts the attribute mapping produced by the extraction collaborator.
 * `null` and `undefined` values are dropped; anything else that is not a string is rejected.
 */
export function normalizeEventAttributes(input: unknown): EventAttributes {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new EventValidationError('event must be an object of attribute values');
  }

  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === null || value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new EventValidationError(`event.${key} must be a string`, key);
    }
    attributes[key] = value;
  }
  return attributes;
}

export function resolveAttribute(event: EventAttributes, name: string): string | undefined {
  if (!isAttributeName(name)) {
    return undefined;
  }
  return readAttribute(event, name);
}

function readAttribute(event: EventAttributes, name: AttributeName): string | undefined {
  const value = event[name];
  return typeof value === 'string' ? value : undefined;
}
