import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'jsdom',
    setupFiles: './vitest.setup.ts',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text-summary', 'text'],
      reportsDirectory: './coverage',
      exclude: [
        'dist/**',
        'src/types/**',
        '**/*.d.ts',
      ],
      thresholds: {
        'src/lib/{tokenizer,rsvp,wordsManager,playback,tabs}.ts': {
          statements: 85,
          branches: 75,
          functions: 90,
          lines: 90,
        },
      },
    },
  },
})
