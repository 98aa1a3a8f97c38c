export * from './query-parser';
export * from './sparse';
export * from './dense';
export * from './spatial';
export * from './terms';
