import { describe, it, expect, vi } from 'vitest';
import { DispatchQueue } from '../../services/dispatch-queue';
import type { DispatchClient } from '../../services/discord-webhook-service';
import type { DiscordMessage, DispatchResult } from '../../types';
import { RecordingClient, fakeClock, silentLogger } from '../helpers';

function message(title: string): DiscordMessage {
  return {
    embeds: [{ title, description: '', color: 0, url: 'https://www.reddit.com/', fields: [], footer: { text: '' } }],
  };
}

const HOOK = 'https://discord.test/webhooks/a';
const OTHER_HOOK = 'https://discord.test/webhooks/b';

describe('DispatchQueue', () => {
  it('should wait out a rate limit before sending to the same webhook again', async () => {
    const { clock, now, sleep } = fakeClock();
    const client = new RecordingClient(clock);
    let limited = false;
    client.respond = () => {
      if (!limited) {
        limited = true;
        return { status: 'rate-limited', retryAfterMs: 30000 };
      }
      return { status: 'delivered' };
    };
    const sleepSpy = vi.fn(sleep);
    const queue = new DispatchQueue(client, { now, sleep: sleepSpy, logger: silentLogger });

    const [first, second] = await Promise.all([
      queue.deliver(message('k'), HOOK),
      queue.deliver(message('k+1'), HOOK),
    ]);

    expect(first).toEqual({ status: 'delivered' });
    expect(second).toEqual({ status: 'delivered' });
    expect(sleepSpy).toHaveBeenCalledWith(30000, undefined);
    expect(client.sent.map((sent) => [sent.title, sent.at])).toEqual([
      ['k', 0],
      ['k', 30000],
      ['k+1', 30000],
    ]);
  });

  it('should report the rate limit once the attempts are used up', async () => {
    const { clock, now, sleep } = fakeClock();
    const client = new RecordingClient(clock);
    client.respond = () => ({ status: 'rate-limited', retryAfterMs: 5000 });
    const queue = new DispatchQueue(client, { now, sleep, maxAttempts: 2, logger: silentLogger });

    const outcome = await queue.deliver(message('k'), HOOK);

    expect(outcome).toEqual({ status: 'rate-limited', retryAfterMs: 5000 });
    expect(client.sent).toHaveLength(2);
    expect(queue.nextSendAt(HOOK)).toBe(10000);
  });

  it('should keep one request in flight per webhook', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const client: DispatchClient = {
      send: async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return { status: 'delivered' };
      },
    };
    const queue = new DispatchQueue(client, { logger: silentLogger });

    await Promise.all([1, 2, 3].map((n) => queue.deliver(message(`m${n}`), HOOK)));

    expect(maxInFlight).toBe(1);
  });

  it('should not hold other webhooks behind a slow one', async () => {
    let release: (result: DispatchResult) => void = () => undefined;
    const order: string[] = [];
    const client: DispatchClient = {
      send: (_message, url) => {
        if (url === HOOK) {
          return new Promise<DispatchResult>((resolve) => {
            release = resolve;
          }).then((result) => {
            order.push('slow');
            return result;
          });
        }
        order.push('fast');
        return Promise.resolve({ status: 'delivered' });
      },
    };
    const queue = new DispatchQueue(client, { logger: silentLogger });

    const slow = queue.deliver(message('slow'), HOOK);
    await queue.deliver(message('fast'), OTHER_HOOK);
    release({ status: 'delivered' });
    await slow;

    expect(order).toEqual(['fast', 'slow']);
  });

  it('should not send once the signal has aborted', async () => {
    const client = new RecordingClient();
    const queue = new DispatchQueue(client, { logger: silentLogger });
    const controller = new AbortController();
    controller.abort();

    const outcome = await queue.deliver(message('k'), HOOK, controller.signal);

    expect(outcome).toEqual({ status: 'aborted' });
    expect(client.sent).toHaveLength(0);
  });

  it('should pass failures through untouched', async () => {
    const client = new RecordingClient();
    client.respond = () => ({ status: 'failed', reason: 'HTTP 500', retryable: true });
    const queue = new DispatchQueue(client, { logger: silentLogger });

    expect(await queue.deliver(message('k'), HOOK)).toEqual({ status: 'failed', reason: 'HTTP 500', retryable: true });
    expect(client.sent).toHaveLength(1);
  });
});
