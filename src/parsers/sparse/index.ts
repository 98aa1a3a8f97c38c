export * from './sparse.parser';
export * from './standard.parser';
export * from './dismax.parser';
export * from './edismax.parser';
