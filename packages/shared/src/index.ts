export * from './types/cfp.js';
export * from './types/conference.js';
export * from './types/notification.js';
export * from './constants/cfp-types.js';
