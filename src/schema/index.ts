export * from './sources';
export * from './documents';
export * from './chunks';
export * from './source-records';
export * from './kb-migrations';
