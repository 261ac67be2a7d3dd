// Types
export * from './types/post';
export * from './types/topic';
export * from './types/user';
export * from './types/api-key';

// Constants
export * from './constants';

// Utils
export * from './utils/date';
export * from './utils/logger';
