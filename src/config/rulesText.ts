import type { MatcherDefinition, RawFingerprintRule, RawFingerprintingConfig } from '../types.js';
import { ConfigValidationError, type ConfigIssue } from '../fingerprinting/errors.js';
import { formatTemplateToken, parseTemplateToken } from '../fingerprinting/template.js';

class RuleSyntaxError extends Error {}

class LineScanner {
  private position = 0;

  constructor(private readonly line: string) {}

  get done() {
    return this.position >= this.line.length;
  }

  peek() {
    return this.line.charAt(this.position);
  }

  startsWith(text: string) {
    return this.line.startsWith(text, this.position);
  }

  advance(count: number) {
    this.position += count;
  }

  skip(pattern: RegExp) {
    while (!this.done && pattern.test(this.peek())) {
      this.position += 1;
    }
  }

  readWhile(accept: (char: string) => boolean): string {
    const start = this.position;
    while (!this.done && accept(this.peek())) {
      this.position += 1;
    }
    return this.line.slice(start, this.position);
  }

  readQuoted(): string {
    let value = '';
    this.position += 1;
    while (!this.done) {
      const char = this.peek();
      if (char === '"') {
        this.position += 1;
        return value;
      }
      if (char === '\\') {
        const next = this.line.charAt(this.position + 1);
        if (next === '"' || next === '\\') {
          value += next;
          this.position += 2;
          continue;
        }
      }
      value += char;
      this.position += 1;
    }
    throw new RuleSyntaxError('has an unterminated quoted string');
  }

  readPlaceholder(): string {
    const end = this.line.indexOf('}}', this.position);
    if (end < 0) {
      throw new RuleSyntaxError('has an unterminated placeholder');
    }
    const value = this.line.slice(this.position, end + 2);
    this.position = end + 2;
    return value;
  }
}

const isSpace = (char: string) => /\s/.test(char);

function parseMatchers(scanner: LineScanner): MatcherDefinition[] {
  const matchers: MatcherDefinition[] = [];
  for (;;) {
    scanner.skip(/\s/);
    if (scanner.done) {
      throw new RuleSyntaxError('is missing "->" between matchers and fingerprint');
    }
    if (scanner.startsWith('->')) {
      scanner.advance(2);
      return matchers;
    }

    const quoted = scanner.peek() === '"';
    const name = quoted ? scanner.readQuoted() : scanner.readWhile(char => char !== ':' && !isSpace(char));
    if ((!quoted && name.length === 0) || scanner.peek() !== ':') {
      throw new RuleSyntaxError(`has a matcher "${name}" that is not of the form name:pattern`);
    }
    scanner.advance(1);
    const pattern = scanner.peek() === '"' ? scanner.readQuoted() : scanner.readWhile(char => !isSpace(char));
    matchers.push([name, pattern]);
  }
}

function readAttributeValue(scanner: LineScanner): string {
  scanner.advance(1);
  return scanner.peek() === '"' ? scanner.readQuoted() : scanner.readWhile(char => char !== ',' && !isSpace(char));
}

function parseLine(line: string): RawFingerprintRule {
  const scanner = new LineScanner(line);
  const matchers = parseMatchers(scanner);
  const fingerprint: string[] = [];
  const attributes: Record<string, string> = {};
  let sawAttribute = false;

  const pushToken = (token: string) => {
    if (sawAttribute) {
      throw new RuleSyntaxError('has fingerprint tokens after attributes');
    }
    fingerprint.push(token);
  };

  for (;;) {
    scanner.skip(/[\s,]/);
    if (scanner.done) {
      break;
    }
    if (scanner.peek() === '"') {
      const value = scanner.readQuoted();
      if (scanner.peek() === '=') {
        attributes[value] = readAttributeValue(scanner);
        sawAttribute = true;
      } else {
        pushToken(value);
      }
      continue;
    }
    if (scanner.startsWith('{{')) {
      pushToken(scanner.readPlaceholder());
      continue;
    }

    const word = scanner.readWhile(char => char !== ',' && char !== '=' && !isSpace(char));
    if (scanner.peek() !== '=') {
      pushToken(word);
      continue;
    }
    if (word.length === 0) {
      throw new RuleSyntaxError('has an attribute without a name');
    }
    attributes[word] = readAttributeValue(scanner);
    sawAttribute = true;
  }

  return sawAttribute ? { matchers, fingerprint, attributes } : { matchers, fingerprint };
}

/**
 * Parses the line-oriented rules format:
 *
 *     # comment
 *     type:DatabaseUnavailable module:"io.example.*" -> database-unavailable, {{ function }} title="DB down"
 *
 * The result is always a version 1 raw config and still has to go through `buildConfig`.
 */
export function parseRulesText(contents: string): RawFingerprintingConfig {
  const rules: RawFingerprintRule[] = [];
  const issues: ConfigIssue[] = [];

  contents.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }
    try {
      rules.push(parseLine(line));
    } catch (error) {
      if (!(error instanceof RuleSyntaxError)) {
        throw error;
      }
      issues.push({ path: `line ${index + 1}`, message: error.message, ruleIndex: rules.length + issues.length });
    }
  });

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return { version: 1, rules };
}

function quote(value: string) {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatValue(value: string, unsafe: RegExp) {
  return value.length === 0 || unsafe.test(value) ? quote(value) : value;
}

function formatName(name: string, unsafe: RegExp) {
  const ambiguous = name.startsWith('->') || name.startsWith('#') || name.startsWith('{{');
  return ambiguous ? quote(name) : formatValue(name, unsafe);
}

function formatFingerprintToken(raw: string) {
  const token = parseTemplateToken(raw);
  if (token.kind === 'placeholder') {
    return formatTemplateToken(token);
  }
  return formatValue(token.value, /[\s",=]/);
}

/** Renders a validated rule back into the text format. */
export function describeRule(rule: RawFingerprintRule): string {
  const matchers = rule.matchers.map(
    ([name, pattern]) => `${formatName(name, /[\s":]/)}:${formatValue(pattern, /[\s"]/)}`
  );
  const tokens = rule.fingerprint.map(formatFingerprintToken);
  const attributes = Object.entries(rule.attributes ?? {}).map(
    ([key, value]) => `${formatName(key, /[\s",=]/)}=${formatValue(value, /[\s",]/)}`
  );
  const left = matchers.length > 0 ? `${matchers.join(' ')} ` : '';
  return `${left}-> ${[...tokens, ...attributes].join(' ')}`;
}
