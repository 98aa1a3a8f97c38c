import { SerializationError } from '../common/errors/serialization.error';

export type ParamScalar = string | number | boolean;

/**
 * Values a parameter model may hold before encoding
 */
export type ParamValue = ParamScalar | ParamScalar[] | Record<string, number>;

export type WireValue = ParamScalar | ParamScalar[];

/**
 * Flat Solr request parameters, keyed by their exact wire name
 */
export type WireParams = Record<string, WireValue>;

/**
 * How a field is written to the wire:
 * - scalar: as is
 * - repeated: list, one `key=value` pair per element
 * - comma / space: list joined into one value
 * - weighted: `{ title: 2 }` → `title^2`, space separated
 * - point: `[lat, lon]` → `lat,lon`
 */
export type ParamEncoding = 'scalar' | 'repeated' | 'comma' | 'space' | 'weighted' | 'point';

export interface ParamField<T> {
  property: keyof T & string;
  wire: string;
  encoding?: ParamEncoding;
}

function isScalar(value: unknown): value is ParamScalar {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isScalarArray(value: unknown): value is ParamScalar[] {
  return Array.isArray(value) && value.every(isScalar);
}

/**
 * Render a scalar the way Solr reads it (`true`/`false`, decimal numbers)
 */
export function formatScalar(value: ParamScalar): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

export function encodeParamValue(key: string, value: unknown, encoding: ParamEncoding): WireValue {
  switch (encoding) {
    case 'scalar':
      if (isScalar(value)) return value;
      break;

    case 'repeated':
      if (isScalar(value)) return [value];
      if (isScalarArray(value)) return [...value];
      break;

    case 'comma':
    case 'space':
      if (typeof value === 'string') return value;
      if (isScalarArray(value)) return value.map(formatScalar).join(encoding === 'comma' ? ',' : ' ');
      break;

    case 'weighted':
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        const tokens: string[] = [];
        for (const [field, weight] of Object.entries(value)) {
          if (typeof weight !== 'number' || !Number.isFinite(weight)) {
            throw new SerializationError(key, `weight for '${field}' is not a finite number`);
          }
          tokens.push(`${field}^${formatScalar(weight)}`);
        }
        return tokens.join(' ');
      }
      break;

    case 'point':
      if (
        Array.isArray(value) &&
        value.length === 2 &&
        value.every(v => typeof v === 'number' && Number.isFinite(v))
      ) {
        return value.join(',');
      }
      break;
  }

  throw new SerializationError(key, `value does not fit the '${encoding}' encoding`);
}

/**
 * Emit every set field of `source` under `prefix + wire`, in table order.
 * Unset (`undefined`) fields are left out.
 */
export function flattenFields<T extends object>(
  source: T,
  fields: ReadonlyArray<ParamField<T>>,
  prefix = '',
): WireParams {
  const params: WireParams = {};

  for (const field of fields) {
    const value: unknown = source[field.property];
    if (value === undefined) continue;

    const key = `${prefix}${field.wire}`;
    params[key] = encodeParamValue(key, value, field.encoding ?? 'scalar');
  }

  return params;
}

/**
 * Encode wire parameters as a query string / form body. Lists become
 * repeated keys; key order follows insertion order.
 */
export function encodeWireParams(params: WireParams): URLSearchParams {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        search.append(key, formatScalar(item));
      }
    } else {
      search.append(key, formatScalar(value));
    }
  }

  return search;
}
