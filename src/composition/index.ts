export * from './compose-params';
