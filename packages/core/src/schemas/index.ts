export * from './export';
export * from './note';
export * from './remote';
