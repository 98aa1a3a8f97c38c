export * from './decorators';
export * from './validate-model';
