import { defineConfig } from 'vitest/config'
import { unitTestProject } from './configs/vitest.config.unit'

export default defineConfig({
  test: {
    projects: [
      {
        extends: true,
        ...unitTestProject,
      },
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],
    env: {
      NODE_ENV: 'test',
    },
    clearMocks: true,
    // Listener tests leave sockets and loops behind only if a test forgets to close them
    teardownTimeout: 5_000,
    onConsoleLog: () => !process.env.TEST_QUIET_CONSOLE,
    coverage: {
      enabled: false,
      include: ['packages/**/src/**.{ts}'],
      clean: true,
      provider: 'v8',
      reportsDirectory: './coverage',
      exclude: ['**/*.d.ts', '**/test/**', '**/node_modules/**'],
    },
  },
})
