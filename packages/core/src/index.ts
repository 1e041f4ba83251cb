export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './config';
export * from './query';
export * from './dialect';
export * from './driver';
export * from './result';

export { Database } from './database';
export type { DatabaseEvents, FieldList, WhereInput } from './database';

export * from './editor';
