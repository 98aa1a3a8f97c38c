import { copyOptions, validateModel } from '../../common/validation/validate-model';
import { WireParams } from '../wire-params';

/**
 * Base class for optional feature blocks (facet, group, highlight, mlt).
 *
 * A block owns a fixed namespace prefix and a fixed enable key. Attaching a
 * block turns its feature on even when no option is set.
 */
export abstract class ParamsConfig {
  /**
   * Top-level switch, e.g. `facet` or `hl`
   */
  abstract get enableKey(): string;

  /**
   * Namespace of every option key, e.g. `facet.` or `hl.`
   */
  abstract get namespace(): string;

  constructor(options: object) {
    Object.assign(this, copyOptions(options));
    validateModel(this, this.constructor.name);
    Object.freeze(this);
  }

  protected abstract flattenOptions(): WireParams;

  flatten(): WireParams {
    return { [this.enableKey]: true, ...this.flattenOptions() };
  }
}
