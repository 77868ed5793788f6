import { describe, test, expect } from 'vitest';
import { EntitlementClient, interpretGiftCode } from '../../api/client.js';
import type { RetryEvent } from '../../api/types.js';
import { TransportError } from '../../errors.js';
import { ScriptedTransport, recordSleeps, respond } from '../helpers/outcomes.js';

const CODE = 'AbCdEfGhIjKlMnOpQrSt';
const BASE_URL = 'https://api.test/v9';

function createClient(script: ConstructorParameters<typeof ScriptedTransport>[0], maxRetries = 3) {
  const transport = new ScriptedTransport(script);
  const { sleeps, sleep } = recordSleeps();
  const retries: RetryEvent[] = [];
  const client = new EntitlementClient({
    baseUrl: BASE_URL,
    maxRetries,
    transport,
    sleep,
    onRetry: (event) => retries.push(event),
  });
  return { client, transport, sleeps, retries };
}

describe('EntitlementClient', () => {
  describe('request', () => {
    test('should request the gift-code endpoint with plan details', async () => {
      const { client, transport } = createClient([respond(404)]);

      await client.check(CODE);

      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0]?.url).toBe(`${BASE_URL}/entitlements/gift-codes/${CODE}`);
      expect(transport.calls[0]?.params).toEqual({
        with_application: 'false',
        with_subscription_plan: 'true',
      });
      expect(transport.calls[0]?.options).toEqual({ timeoutMs: 10_000 });
    });

    test('should drop a trailing slash from the base URL', () => {
      const client = new EntitlementClient({ baseUrl: `${BASE_URL}/` });
      expect(client.lookupUrl(CODE)).toBe(`${BASE_URL}/entitlements/gift-codes/${CODE}`);
    });
  });

  describe('200 responses', () => {
    test('should report an unused code as claimable', async () => {
      const { client } = createClient([
        respond(200, { redeemed: false, uses: 0, max_uses: 1, subscription_plan: { name: 'Nitro' } }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome).toEqual({
        code: CODE,
        kind: 'CLAIMABLE',
        valid: true,
        marker: '✅',
        message: '✅ Code is CLAIMABLE - Nitro',
        plan: 'Nitro',
        uses: 0,
        maxUses: 1,
        attempts: 1,
      });
    });

    test('should report a redeemed code as claimed', async () => {
      const { client } = createClient([
        respond(200, { redeemed: true, uses: 0, max_uses: 5, subscription_plan: { name: 'Nitro' } }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('CLAIMED');
      expect(outcome.marker).toBe('❌');
      expect(outcome.message).toBe('❌ Code is CLAIMED - Nitro (Uses: 0/5)');
    });

    test('should report a used-up code as claimed', async () => {
      const { client } = createClient([
        respond(200, { redeemed: false, uses: 1, max_uses: 1, subscription_plan: { name: 'Nitro Basic' } }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('CLAIMED');
      expect(outcome.valid).toBe(true);
      expect(outcome.message).toBe('❌ Code is CLAIMED - Nitro Basic (Uses: 1/1)');
    });

    test('should show usage for a multi-use code with uses left', async () => {
      const { client } = createClient([
        respond(200, { redeemed: false, uses: 2, max_uses: 5, subscription_plan: { name: 'Nitro' } }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('CLAIMABLE');
      expect(outcome.message).toBe('✅ Code is CLAIMABLE - Nitro (Uses: 2/5)');
    });

    test('should default missing fields to one unused use and an unknown plan', async () => {
      const { client } = createClient([respond(200, { subscription_plan: null })]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('CLAIMABLE');
      expect(outcome.plan).toBe('Unknown');
      expect(outcome.uses).toBe(0);
      expect(outcome.maxUses).toBe(1);
      expect(outcome.message).toBe('✅ Code is CLAIMABLE - Unknown');
    });

    test('should keep the raw body only in diagnostic mode', async () => {
      const body = { redeemed: false, uses: 0, max_uses: 1, store_listing: { sku: 'x' } };
      const { client } = createClient([respond(200, body), respond(200, body)]);

      const diagnostic = await client.check(CODE, { diagnostic: true });
      const quiet = await client.check(CODE);

      expect(diagnostic.raw).toEqual(body);
      expect('raw' in quiet).toBe(false);
    });

    test('should report an error for a body that is not a gift code', async () => {
      const { client } = createClient([respond(200, 'not json')]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('ERROR');
      expect(outcome.valid).toBe(false);
      expect(outcome.message).toBe('❌ Error checking code: Unexpected response body');
    });
  });

  describe('error statuses', () => {
    test('should report 404 as invalid after one request', async () => {
      const { client, transport, sleeps } = createClient([respond(404, { message: 'Unknown Gift Code', code: 10038 })]);

      const outcome = await client.check(CODE);

      expect(outcome).toEqual({
        code: CODE,
        kind: 'INVALID',
        valid: false,
        marker: '⚠️',
        message: '⚠️ Code is INVALID (Unknown Gift Code)',
        plan: null,
        uses: 0,
        maxUses: 1,
        attempts: 1,
      });
      expect(transport.calls).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    test('should use the server message for other statuses', async () => {
      const { client, transport } = createClient([respond(500, { message: 'Internal Server Error' })]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('ERROR');
      expect(outcome.message).toBe('❌ Error checking code: Internal Server Error');
      expect(transport.calls).toHaveLength(1);
    });

    test('should say unknown error when the body has no message', async () => {
      const { client } = createClient([respond(403, null)]);

      const outcome = await client.check(CODE);

      expect(outcome.message).toBe('❌ Error checking code: Unknown error');
    });
  });

  describe('rate limiting', () => {
    test('should give up after three 429s with growing waits', async () => {
      const { client, transport, sleeps } = createClient([respond(429), respond(429), respond(429)]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('RATE_LIMITED');
      expect(outcome.marker).toBe('⏳');
      expect(outcome.message).toBe('⏳ Rate limited - Try again later or increase delay');
      expect(outcome.attempts).toBe(3);
      expect(transport.calls).toHaveLength(3);
      expect(sleeps).toEqual([3000, 6000]);
    });

    test('should use the Retry-After header as the base wait', async () => {
      const { client, sleeps } = createClient([
        respond(429, null, { 'retry-after': '5' }),
        respond(429, null, { 'retry-after': '5' }),
        respond(429, null, { 'retry-after': '5' }),
      ]);

      await client.check(CODE);

      expect(sleeps).toEqual([5000, 10000]);
    });

    test('should cap a rate-limit wait at 30 seconds', async () => {
      const { client, sleeps } = createClient([
        respond(429, null, { 'retry-after': '20' }),
        respond(429, null, { 'retry-after': '20' }),
        respond(429, null, { 'retry-after': '20' }),
      ]);

      await client.check(CODE);

      expect(sleeps).toEqual([20000, 30000]);
    });

    test('should succeed when a retry gets through', async () => {
      const { client, transport, sleeps } = createClient([
        respond(429),
        respond(200, { redeemed: false, uses: 0, max_uses: 1, subscription_plan: { name: 'Nitro' } }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('CLAIMABLE');
      expect(outcome.attempts).toBe(2);
      expect(transport.calls).toHaveLength(2);
      expect(sleeps).toEqual([3000]);
    });

    test('should report each retry before sleeping', async () => {
      const { client, retries } = createClient([respond(429), respond(429), respond(429)]);

      await client.check(CODE);

      expect(retries).toEqual([
        { code: CODE, attempt: 0, maxRetries: 3, waitSeconds: 3, reason: 'rate_limited' },
        { code: CODE, attempt: 1, maxRetries: 3, waitSeconds: 6, reason: 'rate_limited' },
      ]);
    });

    test('should return rate limited straight away with a single attempt', async () => {
      const { client, sleeps } = createClient([respond(429)], 1);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('RATE_LIMITED');
      expect(sleeps).toEqual([]);
    });
  });

  describe('transport failures', () => {
    test('should retry network errors and report the last one', async () => {
      const { client, transport, sleeps, retries } = createClient([
        new TransportError('fetch failed (connect ECONNREFUSED)'),
        new TransportError('fetch failed (connect ECONNREFUSED)'),
        new TransportError('Request timed out after 10000ms', { timedOut: true }),
      ]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('ERROR');
      expect(outcome.message).toBe('❌ Network error: Request timed out after 10000ms');
      expect(outcome.attempts).toBe(3);
      expect(transport.calls).toHaveLength(3);
      expect(sleeps).toEqual([2000, 4000]);
      expect(retries.map((event) => event.reason)).toEqual(['network_error', 'network_error']);
    });

    test('should cap network waits at 10 seconds', async () => {
      const failures = Array.from({ length: 5 }, () => new TransportError('fetch failed'));
      const { client, sleeps } = createClient(failures, 5);

      await client.check(CODE);

      expect(sleeps).toEqual([2000, 4000, 8000, 10000]);
    });

    test('should recover when a retry succeeds', async () => {
      const { client, sleeps } = createClient([new TransportError('fetch failed'), respond(404)]);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('INVALID');
      expect(outcome.attempts).toBe(2);
      expect(sleeps).toEqual([2000]);
    });
  });

  describe('retry budget', () => {
    test('should let a per-call maxRetries override the client default', async () => {
      const { client, transport } = createClient([respond(429), respond(429)]);

      const outcome = await client.check(CODE, { maxRetries: 2 });

      expect(outcome.kind).toBe('RATE_LIMITED');
      expect(transport.calls).toHaveLength(2);
    });

    test('should report max retries exceeded when no attempt is allowed', async () => {
      const { client, transport } = createClient([], 0);

      const outcome = await client.check(CODE);

      expect(outcome.kind).toBe('ERROR');
      expect(outcome.message).toBe('❌ Max retries exceeded');
      expect(outcome.attempts).toBe(0);
      expect(transport.calls).toHaveLength(0);
    });
  });
});

describe('interpretGiftCode', () => {
  test('should carry the attempt count through', () => {
    const outcome = interpretGiftCode(CODE, { uses: 0, max_uses: 1 }, 2, false);
    expect(outcome.attempts).toBe(2);
  });

  test('should reject negative use counts', () => {
    const outcome = interpretGiftCode(CODE, { uses: -1 }, 1, true);
    expect(outcome.kind).toBe('ERROR');
    expect(outcome.raw).toEqual({ uses: -1 });
  });
});
