import { defineConfig } from 'vitest/config';

// Start times are local wall-clock values; pin the zone so expectations are stable.
// Set here too so forked workers inherit it from their first Date onwards.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    env: {
      TZ: 'UTC',
      LOG_LEVEL: 'silent'
    }
  }
});
