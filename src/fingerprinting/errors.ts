export type ConfigIssue = {
  path: string;
  message: string;
  ruleIndex: number | null;
};

export class ConfigValidationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(issues.map(issue => `${issue.path} ${issue.message}`).join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }

  /** Index of the first rule that failed validation, or null for config-level problems. */
  get ruleIndex(): number | null {
    for (const issue of this.issues) {
      if (issue.ruleIndex !== null) {
        return issue.ruleIndex;
      }
    }
    return null;
  }
}

export class PatternSyntaxError extends Error {
  constructor(readonly pattern: string, reason: string) {
    super(`invalid pattern "${pattern}": ${reason}`);
    this.name = 'PatternSyntaxError';
  }
}

export class TemplateSyntaxError extends Error {
  constructor(readonly token: string, reason: string) {
    super(`invalid fingerprint token "${token}": ${reason}`);
    this.name = 'TemplateSyntaxError';
  }
}

export class EventValidationError extends Error {
  constructor(message: string, readonly key: string | null = null) {
    super(message);
    this.name = 'EventValidationError';
  }
}
