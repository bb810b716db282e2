import { describe, it, expect, vi } from 'vitest';
import { getProductionContainer } from '../src/container.production.js';
import { ConsoleLogProvider } from '../src/providers/ConsoleLogProvider.js';

describe('getProductionContainer', () => {
  it('should build once from the environment and reuse the result', () => {
    const env = { COMPLETION_PROVIDER: 'bedrock', MODEL_REGION: 'us-west-2' };

    const first = getProductionContainer(env);
    const second = getProductionContainer({});

    expect(second).toBe(first);
  });

  it('should log to stdout without keeping events across warm invocations', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { logProvider } = getProductionContainer({ COMPLETION_PROVIDER: 'bedrock' });

    expect(logProvider).toBeInstanceOf(ConsoleLogProvider);
    if (logProvider instanceof ConsoleLogProvider) {
      logProvider.info('POST /insights');
      logProvider.info('POST /segments');
      expect(logProvider.events).toHaveLength(0);
    }
    expect(spy).toHaveBeenCalledTimes(2);
    spy.mockRestore();
  });
});
