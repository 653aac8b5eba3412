// Re-export everything
export * from './index';

// Test utilities (below)
export { TestHarness, type TestHarnessOptions } from './test/harness';
export * from './test/models';
