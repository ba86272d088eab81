// Configuration types
export * from './config';

// GMP protocol and session types
export * from './gmp';

// Scan registry, result and API types
export * from './scans';
