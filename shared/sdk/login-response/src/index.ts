export * from './types';
export * from './errors';
export * from './config';
export * from './exclusion';
export * from './authReason';
export * from './classifier';
export * from './structuredWriter';
export * from './pageWriter';
export * from './dispatcher';
