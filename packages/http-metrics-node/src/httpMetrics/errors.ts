export class HttpMetricsConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid HTTP metrics configuration: ${issues.join('; ')}`);
    this.name = 'HttpMetricsConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, HttpMetricsConfigError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      issues: this.issues,
    };
  }
}
