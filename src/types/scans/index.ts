export * from './scan';
export * from './api';
