import { ValidationArguments, ValidationOptions, registerDecorator } from 'class-validator';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `{ field: weight }` with finite numeric weights, as used by `qf`/`pf`
 */
export function IsWeightMap(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isWeightMap',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          if (!isRecord(value)) return false;
          return Object.entries(value).every(
            ([field, weight]) =>
              field.trim().length > 0 && typeof weight === 'number' && Number.isFinite(weight),
          );
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must map field names to finite numeric weights`;
        },
      },
    });
  };
}

/**
 * A single string or a list of strings
 */
export function IsStringOrStringArray(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isStringOrStringArray',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          if (typeof value === 'string') return true;
          return Array.isArray(value) && value.every(item => typeof item === 'string');
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be a string or an array of strings`;
        },
      },
    });
  };
}

/**
 * Every element of a value (or the value itself) is one of `allowed`
 */
export function IsInOrEachIn(allowed: readonly unknown[], validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isInOrEachIn',
      target: object.constructor,
      propertyName,
      constraints: [allowed],
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          const values = Array.isArray(value) ? value : [value];
          return values.length > 0 && values.every(item => allowed.includes(item));
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be one (or a list) of: ${allowed.join(', ')}`;
        },
      },
    });
  };
}

/**
 * A string or a finite number, e.g. a range bound such as `0` or `NOW/DAY`
 */
export function IsStringOrNumber(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isStringOrNumber',
      target: object.constructor,
      propertyName,
      options: validationOptions,
      validator: {
        validate(value: unknown) {
          return (
            (typeof value === 'string' && value.length > 0) ||
            (typeof value === 'number' && Number.isFinite(value))
          );
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be a non-empty string or a finite number`;
        },
      },
    });
  };
}
