import { describe, it, expect } from 'vitest';
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DiscordWebhookService } from '../../services/discord-webhook-service';
import type { DiscordMessage } from '../../types';

const HOOK = 'https://discord.test/webhooks/a';
const MESSAGE: DiscordMessage = {
  embeds: [{ title: 'Hello', description: '', color: 1, url: 'https://www.reddit.com/', fields: [], footer: { text: 'r/python' } }],
};

function serviceAnswering(status: number, data: unknown = '', headers: Record<string, string> = {}) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      return { data, status, statusText: '', headers, config };
    },
  });
  return { service: new DiscordWebhookService(1000, http), requests };
}

describe('DiscordWebhookService', () => {
  it('should post the embeds as JSON and report delivery', async () => {
    const { service, requests } = serviceAnswering(204);

    const result = await service.send(MESSAGE, HOOK);

    expect(result).toEqual({ status: 'delivered' });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(HOOK);
    expect(requests[0].method).toBe('post');
    expect(JSON.parse(String(requests[0].data))).toEqual(MESSAGE);
  });

  it('should read the retry delay from the 429 body', async () => {
    const { service } = serviceAnswering(429, { message: 'You are being rate limited.', retry_after: 2.5 });

    expect(await service.send(MESSAGE, HOOK)).toEqual({ status: 'rate-limited', retryAfterMs: 2500 });
  });

  it('should fall back to the Retry-After header', async () => {
    const { service } = serviceAnswering(429, '', { 'retry-after': '3' });

    expect(await service.send(MESSAGE, HOOK)).toEqual({ status: 'rate-limited', retryAfterMs: 3000 });
  });

  it('should mark rejected payloads as not retryable', async () => {
    const { service } = serviceAnswering(400, { message: 'Invalid Form Body' });

    expect(await service.send(MESSAGE, HOOK)).toEqual({
      status: 'failed',
      reason: 'Discord rejected the message (HTTP 400)',
      retryable: false,
    });
  });

  it('should mark server errors as retryable', async () => {
    const { service } = serviceAnswering(502);

    expect(await service.send(MESSAGE, HOOK)).toEqual({
      status: 'failed',
      reason: 'Discord responded with HTTP 502',
      retryable: true,
    });
  });

  it('should turn network errors into retryable failures', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('socket hang up');
      },
    });
    const service = new DiscordWebhookService(1000, http);

    expect(await service.send(MESSAGE, HOOK)).toEqual({ status: 'failed', reason: 'socket hang up', retryable: true });
  });
});
