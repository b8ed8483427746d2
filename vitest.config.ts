import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['telemetry-service/src/**/*.spec.ts', 'examples/virtual-sensor/src/**/*.spec.ts'],
    environment: 'node',
    // signal listeners and native SQLite bindings run in child processes
    pool: 'forks',
    testTimeout: 10_000,
  },
});
