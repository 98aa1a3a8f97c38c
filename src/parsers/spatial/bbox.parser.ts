import { SpatialQueryOptions, SpatialQueryParser } from './spatial.parser';

/**
 * Documents inside the box enclosing the `radialDistance` circle. Cheaper
 * than geofilt, and may match points slightly outside the circle.
 */
export class BoundingBoxQueryParser extends SpatialQueryParser {
  constructor(options: SpatialQueryOptions) {
    super(options);
  }

  get defType(): string {
    return 'bbox';
  }
}
