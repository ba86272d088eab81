export * from './protocol';
export * from './session';
