import { SerializationError } from '../../common/errors/serialization.error';
import { ParamScalar, formatScalar } from '../../params/wire-params';

/**
 * Decoded `{!parser key=value ...}payload` string
 */
export interface LocalParams {
  parser: string;
  /** Keys given more than once collect into a list */
  params: Record<string, string | string[]>;
  payload: string;
}

export type LocalParamEntry = [key: string, value: ParamScalar];

const NEEDS_QUOTES = /[\s'"{}\\]/;

/**
 * Quote a local-params value when it would otherwise end the token
 */
export function quoteLocalParam(value: ParamScalar): string {
  const text = formatScalar(value);
  if (text.length > 0 && !NEEDS_QUOTES.test(text)) {
    return text;
  }
  return `'${text.replace(/[\\']/g, match => `\\${match}`)}'`;
}

/**
 * `{!knn f=vector topK=10}` followed by `payload`
 */
export function formatLocalParams(
  parser: string,
  entries: ReadonlyArray<LocalParamEntry>,
  payload: string,
): string {
  const tokens = [`!${parser}`, ...entries.map(([key, value]) => `${key}=${quoteLocalParam(value)}`)];
  return `{${tokens.join(' ')}}${payload}`;
}

/**
 * `[0.1,0.2,0.3]`
 */
export function formatVectorPayload(vector: ReadonlyArray<number>): string {
  return `[${vector.map(formatScalar).join(',')}]`;
}

function fail(message: string): never {
  throw new SerializationError('q', message);
}

/**
 * Read a local-params query back into its parts. Accepts the quoting written
 * by {@link quoteLocalParam} (single or double quotes, backslash escapes).
 */
export function parseLocalParams(input: string): LocalParams {
  if (!input.startsWith('{!')) {
    fail('local params must start with "{!"');
  }

  let pos = 2;
  const skipSpaces = (): void => {
    while (pos < input.length && /\s/.test(input[pos])) pos++;
  };
  const readBare = (stop: RegExp): string => {
    const begin = pos;
    while (pos < input.length && !stop.test(input[pos])) pos++;
    return input.slice(begin, pos);
  };

  const parser = readBare(/[\s}=]/);
  if (parser.length === 0) {
    fail('missing parser name');
  }

  const params: Record<string, string | string[]> = {};

  for (;;) {
    skipSpaces();
    if (pos >= input.length) {
      fail('unterminated local params');
    }
    if (input[pos] === '}') {
      pos++;
      break;
    }

    const key = readBare(/[\s}=]/);
    if (key.length === 0 || input[pos] !== '=') {
      fail(`expected key=value at offset ${pos}`);
    }
    pos++;

    let value: string;
    const quote = input[pos];
    if (quote === "'" || quote === '"') {
      pos++;
      let text = '';
      while (pos < input.length && input[pos] !== quote) {
        if (input[pos] === '\\' && pos + 1 < input.length) pos++;
        text += input[pos];
        pos++;
      }
      if (pos >= input.length) {
        fail(`unterminated quoted value for '${key}'`);
      }
      pos++;
      value = text;
    } else {
      value = readBare(/[\s}]/);
    }

    const existing = params[key];
    if (existing === undefined) {
      params[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      params[key] = [existing, value];
    }
  }

  return { parser, params, payload: input.slice(pos) };
}

/**
 * `[1, 2.5,-3]` → `[1, 2.5, -3]`
 */
export function parseVectorPayload(payload: string): number[] {
  const trimmed = payload.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    fail('vector payload must be enclosed in brackets');
  }

  const body = trimmed.slice(1, -1).trim();
  if (body.length === 0) {
    fail('vector payload is empty');
  }

  return body.split(',').map(item => {
    const value = Number(item.trim());
    if (item.trim().length === 0 || !Number.isFinite(value)) {
      fail(`'${item.trim()}' is not a number`);
    }
    return value;
  });
}
