// Jest setup file: mute console output during tests by default.
// Set environment variable SHOW_CONSOLE=1 to see logs while running tests.
import { jest } from '@jest/globals';

if (!process.env.SHOW_CONSOLE) {
  const methods = ['log', 'info', 'warn', 'debug', 'error'] as const;
  methods.forEach((m) => {
    // use a no-op implementation so tests don't show noisy logs
    jest.spyOn(console, m).mockImplementation(() => {});
  });
}
