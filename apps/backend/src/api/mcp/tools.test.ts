// =============================================================================
// Chat History Tools - Unit Tests
// =============================================================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SearchResult } from '@chat-recall/shared-types';
import { createServices, type Services } from '../../services/index.js';
import { HashingEmbedder, createFakeProviders, createTestConfig } from '../../test-utils/fakes.js';
import {
  createToolHandlers,
  formatError,
  formatSearchResults,
  formatStats,
  type ChatHistoryToolHandlers,
} from './tools.js';
import { InvalidArgumentError } from '../../domain/errors/index.js';

function result(score: number, response: string): SearchResult {
  return {
    recordId: '1f2e3d4c-5b6a-4789-8abc-def012345678',
    score,
    record: {
      id: '1f2e3d4c-5b6a-4789-8abc-def012345678',
      provider: 'anthropic',
      prompt: 'What is a closure?',
      response,
      embedding: [1, 0],
      metadata: {},
      createdAt: new Date('2026-04-12T16:20:00.000Z'),
    },
  };
}

describe('formatSearchResults', () => {
  it('lists provider, timestamp, rounded score, question and answer', () => {
    expect(formatSearchResults([result(0.87349, 'A function bundled with its scope.')])).toBe(
      [
        'Found 1 similar conversation:',
        '',
        '1. **[ANTHROPIC]** 2026-04-12T16:20:00.000Z (score 0.873)',
        'Q: What is a closure?',
        'A: A function bundled with its scope.',
      ].join('\n')
    );
  });

  it('truncates long answers to 200 characters', () => {
    const text = formatSearchResults([result(0.5, 'x'.repeat(250)), result(0.25, 'short')]);

    expect(text.split('\n')).toEqual([
      'Found 2 similar conversations:',
      '',
      '1. **[ANTHROPIC]** 2026-04-12T16:20:00.000Z (score 0.500)',
      'Q: What is a closure?',
      `A: ${'x'.repeat(200)}...`,
      '',
      '2. **[ANTHROPIC]** 2026-04-12T16:20:00.000Z (score 0.250)',
      'Q: What is a closure?',
      'A: short',
    ]);
  });

  it('says so when nothing matched', () => {
    expect(formatSearchResults([])).toBe('No similar conversations found.');
  });
});

describe('formatStats', () => {
  it('lists totals, per-provider counts and the time span', () => {
    expect(
      formatStats({
        totalCount: 5,
        perProviderCount: { openai: 3, anthropic: 2 },
        earliest: new Date('2026-01-01T00:00:00.000Z'),
        latest: new Date('2026-01-31T23:59:59.000Z'),
      })
    ).toBe(
      [
        'Total conversations: 5',
        'By provider:',
        '- OPENAI: 3',
        '- ANTHROPIC: 2',
        'Earliest: 2026-01-01T00:00:00.000Z',
        'Latest: 2026-01-31T23:59:59.000Z',
      ].join('\n')
    );
  });

  it('shows only the total for an empty history', () => {
    expect(
      formatStats({ totalCount: 0, perProviderCount: {}, earliest: null, latest: null })
    ).toBe('Total conversations: 0');
  });
});

describe('formatError', () => {
  it('includes the error code of application errors', () => {
    expect(formatError(new InvalidArgumentError('k must be a positive integer'))).toBe(
      'Error [INVALID_ARGUMENT]: k must be a positive integer'
    );
  });

  it('labels anything else as internal', () => {
    expect(formatError(new Error('boom'))).toBe('Error [INTERNAL_ERROR]: boom');
  });
});

describe('tool handlers', () => {
  let services: Services;
  let providers: ReturnType<typeof createFakeProviders>;
  let handlers: ChatHistoryToolHandlers;

  beforeEach(async () => {
    providers = createFakeProviders();
    services = await createServices(createTestConfig(), { embedder: new HashingEmbedder(), providers });
    handlers = createToolHandlers(services.chatHistory);
  });

  afterEach(async () => {
    await services.close();
  });

  it('ask_llm defaults to openai and returns the answer', async () => {
    expect(await handlers.askLlm({ question: 'Hello?' })).toEqual({
      content: [{ type: 'text', text: 'openai answer' }],
    });
    expect(providers.openai.calls).toHaveLength(1);
  });

  it('search_chat_history finds a recorded exchange', async () => {
    await handlers.askLlm({ question: 'machine learning basics', provider: 'google' });

    const found = await handlers.searchChatHistory({ query: 'machine learning', limit: 3 });

    expect(found.isError).toBeUndefined();
    expect(found.content).toEqual([
      {
        type: 'text',
        text: expect.stringMatching(
          /^Found 1 similar conversation:\n\n1\. \*\*\[GOOGLE\]\*\* \S+ \(score 0\.\d{3}\)\nQ: machine learning basics\nA: google answer$/
        ),
      },
    ]);
  });

  it('returns invalid arguments as error results', async () => {
    expect(await handlers.searchChatHistory({ query: 'anything', limit: 0 })).toEqual({
      content: [{ type: 'text', text: 'Error [INVALID_ARGUMENT]: k must be a positive integer' }],
      isError: true,
    });
  });

  it('get_chat_stats applies provider and time filters', async () => {
    await handlers.askLlm({ question: 'one', provider: 'openai' });
    await handlers.askLlm({ question: 'two', provider: 'anthropic' });

    const stats = await handlers.getChatStats({ providers: ['anthropic'], since: '2000-01-01T00:00:00Z' });

    expect(stats.content).toEqual([
      { type: 'text', text: expect.stringMatching(/^Total conversations: 1\nBy provider:\n- ANTHROPIC: 1\n/) },
    ]);
  });

  it('get_chat_stats rejects an unparseable timestamp', async () => {
    expect(await handlers.getChatStats({ since: 'last tuesday' })).toEqual({
      content: [{ type: 'text', text: 'Error [INVALID_ARGUMENT]: since must be an ISO datetime' }],
      isError: true,
    });
  });
});
