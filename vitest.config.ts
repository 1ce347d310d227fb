import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic'
  },
  test: {
    environment: 'node',
    // Frames are asserted as plain text.
    env: { FORCE_COLOR: '0' },
    include: [
      'src/**/*.test.{ts,tsx}', // Engine and component tests
      'cli/**/*.test.ts' // Host file tests
    ]
  }
});
