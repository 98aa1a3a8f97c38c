import { SpatialQueryOptions, SpatialQueryParser } from './spatial.parser';

/**
 * Documents within `radialDistance` of `centerPoint`.
 *
 * @example
 * new GeoFilterQueryParser({
 *   spatialField: 'store',
 *   centerPoint: [45.15, -93.85],
 *   radialDistance: 5,
 * }).build();
 * // { defType: 'geofilt', sfield: 'store', pt: '45.15,-93.85', d: 5 }
 */
export class GeoFilterQueryParser extends SpatialQueryParser {
  constructor(options: SpatialQueryOptions) {
    super(options);
  }

  get defType(): string {
    return 'geofilt';
  }
}
