export * from './terms.parser';
