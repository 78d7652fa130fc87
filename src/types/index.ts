export type * from './request.js';
export type * from './classification.js';
export type * from './gate.js';
export type * from './policy.js';
export type * from './response.js';
