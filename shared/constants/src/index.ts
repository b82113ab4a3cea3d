export * from './authReasons';
export * from './loginOutcomes';
export * from './http';
