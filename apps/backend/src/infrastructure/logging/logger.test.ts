import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from './logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function entries(): unknown[] {
    return vi.mocked(console.error).mock.calls.map((call) => JSON.parse(String(call[0])));
  }

  it('writes structured JSON entries to stderr', () => {
    new Logger().info('Conversation stored', { recordId: 'r-1' });

    expect(entries()).toEqual([
      expect.objectContaining({ level: 'info', message: 'Conversation stored', recordId: 'r-1' }),
    ]);
  });

  it('drops entries below the threshold', () => {
    const log = new Logger({ level: 'warn' });

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(entries()).toEqual([expect.objectContaining({ level: 'warn', message: 'shown' })]);
  });

  it('merges child context and shares the threshold with the parent', () => {
    const parent = new Logger({ level: 'info' });
    const child = parent.child({ service: 'SimilaritySearchService' });

    child.debug('hidden');
    parent.setLevel('debug');
    child.debug('Similarity search completed', { limit: 5 });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'debug',
        message: 'Similarity search completed',
        service: 'SimilaritySearchService',
        limit: 5,
      }),
    ]);
  });

  it('serializes errors', () => {
    new Logger().error('Provider call failed', new Error('rate limited'), { provider: 'openai' });

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'error',
        provider: 'openai',
        error: expect.objectContaining({ name: 'Error', message: 'rate limited' }),
      }),
    ]);
  });
});
