// Global build-mode flag for dead code elimination.
// Defined as true by vitest.config.ts; the library build rewrites it
// to a process.env.NODE_ENV check.
declare const __DEV__: boolean;
