/**
 * Jest setup file.
 * Silence the logger before any module creates it, and make sure no test
 * reaches the network through the global fetch.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

declare const global: { fetch?: typeof fetch };

// Cast jest.fn() to the expected `fetch` type to avoid `any`.
global.fetch = (jest.fn(() => Promise.reject(new Error('network disabled in tests'))) as unknown) as typeof fetch;

export {};
