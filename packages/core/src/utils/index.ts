export * from './validation';
export * from './logging';
export * from './scalar';
