export * from './driver-connection';
export * from './connector-registry';
