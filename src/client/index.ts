export * from './lib/auth';
export * from './lib/transport';
export * from './lib/client';
