export type * from './gps';
export type * from './ride';
export * from './settings';
