export * from './wire-params';
export * from './common-params';
export * from './configs';
