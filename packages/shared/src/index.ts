// Types
export * from './types/post';
export * from './types/publication';
export * from './types/result';

// Constants
export * from './constants';

// Utils
export * from './utils/date';
export * from './utils/logger';
