export * from './local-params';
export * from './dense.parser';
export * from './knn.parser';
export * from './knn-text-to-vector.parser';
export * from './vector-similarity.parser';
