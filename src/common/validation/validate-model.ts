import { ValidationError, validateSync } from 'class-validator';
import { ConfigurationError } from '../errors/configuration.error';

/**
 * Flatten class-validator errors into `path: message` lines
 */
export function formatViolations(errors: ValidationError[], parentPath = ''): string[] {
  const lines: string[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      for (const message of Object.values(error.constraints)) {
        lines.push(`${path}: ${message}`);
      }
    }

    if (error.children && error.children.length > 0) {
      lines.push(...formatViolations(error.children, path));
    }
  }

  return lines;
}

/**
 * Validate a freshly assigned parameter model.
 *
 * Models are closed: a key without a validation decorator is reported, as is
 * an explicit `null` (absent options are left `undefined`).
 */
export function validateModel(model: object, label: string): void {
  const violations: string[] = [];

  for (const [key, value] of Object.entries(model)) {
    if (value === null) {
      violations.push(`${key}: must not be null`);
    }
  }

  const errors = validateSync(model, {
    whitelist: true,
    forbidNonWhitelisted: true,
    forbidUnknownValues: true,
  });
  violations.push(...formatViolations(errors));

  if (violations.length > 0) {
    throw new ConfigurationError(`Invalid ${label}`, violations);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function detach(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(detach));
  }
  if (isPlainObject(value)) {
    return Object.freeze(
      Object.fromEntries(Object.entries(value).map(([key, item]) => [key, detach(item)])),
    );
  }
  return value;
}

/**
 * Frozen copy of the caller's options: arrays and plain objects are copied at
 * every depth, model instances are kept as they are
 */
export function copyOptions(options: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).map(([key, value]) => [key, detach(value)]));
}
