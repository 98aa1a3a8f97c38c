export * from './params-config';
export * from './facet.config';
export * from './group.config';
export * from './highlight.config';
export * from './more-like-this.config';
