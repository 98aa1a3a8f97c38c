export * from './spatial.parser';
export * from './geofilt.parser';
export * from './bbox.parser';
