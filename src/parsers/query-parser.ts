import { CommonParams } from '../params/common-params';
import { WireParams } from '../params/wire-params';

/**
 * Base class of every query parser model.
 *
 * A parser is a {@link CommonParams} block plus the fields of its family.
 * `build()` merges both; on a key collision the family value wins.
 */
export abstract class QueryParser extends CommonParams {
  /**
   * Family specific parameters, feature blocks included
   */
  protected abstract flattenOwn(): WireParams;

  /**
   * Flat request parameters for this query. Pure: the model is frozen, so two
   * calls return equal results.
   */
  build(): WireParams {
    return { ...this.flatten(), ...this.flattenOwn() };
  }
}
