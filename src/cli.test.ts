import { describe, it, expect, vi } from 'vitest';
import { main } from './cli.js';
import { BASE_ENV, createFakeTransport } from './testing/fixtures.js';
import { NodemailerEmailService } from './services/infrastructure/EmailService.js';
import type { FetchResult } from './types/notice.js';

const NOW = () => new Date('2026-10-19T12:00:00Z');

describe('main', () => {
  it('exits with the configuration status before touching the network', async () => {
    const createSource = vi.fn();
    const createEmailService = vi.fn();

    const code = await main({ ...BASE_ENV, SENDER_EMAIL: undefined }, { createSource, createEmailService, now: NOW });

    expect(code).toBe(2);
    expect(createSource).not.toHaveBeenCalled();
    expect(createEmailService).not.toHaveBeenCalled();
  });

  it('exits with 0 after delivering the digest', async () => {
    const transport = createFakeTransport();
    const fetched: FetchResult = { notices: [], pagesFetched: 1, truncated: false };

    const code = await main(BASE_ENV, {
      createSource: () => ({ fetchAllNotices: async () => fetched }),
      createEmailService: (config) => new NodemailerEmailService(config.email, { createTransport: transport.factory }),
      now: NOW,
    });

    expect(code).toBe(0);
    expect(transport.sent).toHaveLength(1);
  });

  it('exits with 1 on an unexpected error', async () => {
    const code = await main(BASE_ENV, {
      createSource: () => ({
        fetchAllNotices: async () => {
          throw new TypeError('cannot read properties of undefined');
        },
      }),
      createEmailService: () => ({ send: async () => undefined }),
      now: NOW,
    });

    expect(code).toBe(1);
  });
});
