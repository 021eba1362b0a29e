import { resolveLogLevel } from '../../src/utils/logger';

describe('resolveLogLevel', () => {
  it('accepts known levels regardless of case and padding', () => {
    expect(resolveLogLevel(' WARN ', 'production')).toBe('warn');
  });

  it('falls back to the environment default for unknown or missing levels', () => {
    expect(resolveLogLevel('loud', 'development')).toBe('info');
    expect(resolveLogLevel(undefined, 'test')).toBe('silent');
  });
});
