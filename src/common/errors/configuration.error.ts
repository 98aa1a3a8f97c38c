/**
 * Raised while constructing a parameter model: a required field is missing,
 * mutually exclusive fields are both (or neither) set, or a value is outside
 * its declared range. Never raised by a remote call.
 */
export class ConfigurationError extends Error {
  readonly violations: string[];

  constructor(message: string, violations: string[] = []) {
    super(violations.length > 0 ? `${message}: ${violations.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.violations = violations;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
