import { QueryParser } from '../parsers/query-parser';
import { WireParams } from '../params/wire-params';

/**
 * A parser model, a raw `q` string, or parameters that are already flat
 */
export type QueryInput = QueryParser | string | WireParams;

/**
 * Final request parameters: the built query overlaid with `extras`.
 * Caller supplied extras win on a key collision. Neither input is modified.
 */
export function composeParams(query: QueryInput, extras: WireParams = {}): WireParams {
  let built: WireParams;
  if (query instanceof QueryParser) {
    built = query.build();
  } else if (typeof query === 'string') {
    built = { q: query };
  } else {
    built = { ...query };
  }

  return { ...built, ...extras };
}
