/**
 * Test fixtures: config and an in-process stand-in for the completion endpoint.
 */

import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BotConfigSchema, type BotConfig } from '../../src/config/schema.js';

export function createTestConfig(overrides?: Partial<Record<string, unknown>>): BotConfig {
  return BotConfigSchema.parse({
    logging: { level: 'error' },
    ...overrides,
  });
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'sannu-test-'));
}

export interface RecordedRequest {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

export interface FakeEndpoint {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

function record(requests: RecordedRequest[], input: string | URL | Request, init?: RequestInit): void {
  const parsed: unknown = JSON.parse(String(init?.body ?? '{}'));
  requests.push({
    url: input instanceof Request ? input.url : String(input),
    headers: new Headers(init?.headers),
    body: typeof parsed === 'object' && parsed !== null ? { ...parsed } : {},
  });
}

/** Endpoint answering every request with a fixed status and raw body. */
export function fakeEndpoint(status: number, body: string): FakeEndpoint {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetch: async (input, init) => {
      record(requests, input, init);
      return new Response(body, { status, headers: { 'content-type': 'application/json' } });
    },
  };
}

/** Endpoint returning a chat completion whose first choice carries `content`. */
export function completionEndpoint(content: string): FakeEndpoint {
  return fakeEndpoint(200, JSON.stringify({
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-3.5-turbo',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  }));
}

/** Endpoint that never answers; the request only ends when its signal aborts. */
export function hangingEndpoint(): FakeEndpoint {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetch: (input, init) => {
      record(requests, input, init);
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      });
    },
  };
}
