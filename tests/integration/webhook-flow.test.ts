import { FastifyInstance } from 'fastify';
import twilio from 'twilio';
import { buildApp } from '../../src/app';
import { FollowUpTracker } from '../../src/dispatch/follow-up-tracker';
import { DiscordAdapter } from '../../src/channels/discord-adapter';
import { createDiscordVerifier, createTwilioVerifier, createWebVerifier } from '../../src/security/webhook-verifier';
import { createPipelineConfig } from '../../src/config/pipeline-config';
import { SAFE_FALLBACK_TEXT } from '../../src/reply/templates';
import { FakeInference } from '../helpers/fixtures';
import { discordKeyPair } from '../helpers/signing';

const TWILIO_TOKEN = 'test-secret';
const HOST = 'gateway.test';

async function waitUntil(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('Webhook Integration Flow', () => {
  let app: FastifyInstance;
  let followUps: FollowUpTracker;
  const discordKeys = discordKeyPair();
  const fetchImpl = jest.fn();
  const inference = new FakeInference(['Halo dari gateway!']);

  beforeAll(async () => {
    const result = await buildApp({
      config: createPipelineConfig({ inference: { timeoutMs: 200, retryDelayMs: 1, minAttemptBudgetMs: 10 } }),
      redis: null,
      inference,
      knowledgeSource: null,
      adapters: { discord: new DiscordAdapter({ apiBaseUrl: 'https://discord.test/api/v10', fetchImpl }) },
      verifiers: {
        whatsapp: createTwilioVerifier({ authToken: TWILIO_TOKEN, enabled: true }),
        discord: createDiscordVerifier({ publicKey: discordKeys.publicKeyHex, enabled: true }),
        web: createWebVerifier({ secret: '' }),
      },
    });
    app = result.app;
    followUps = result.followUps;
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /chat', () => {
    it('answers a greeting', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { text: 'halo', user: 'alice', message_id: 'web-1' },
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({
        answer: 'Halo dari gateway!',
        intent: 'greeting',
        escalate: false,
        replayed: false,
      });
    });

    it('replays a duplicate message id without a second model call', async () => {
      const callsBefore = inference.calls.length;
      const res = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { text: 'halo', user: 'alice', message_id: 'web-1' },
      });

      expect(JSON.parse(res.body)).toEqual({
        answer: 'Halo dari gateway!',
        intent: 'greeting',
        escalate: false,
        replayed: true,
      });
      expect(inference.calls.length).toBe(callsBefore);
    });

    it('escalates out-of-scope questions', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { text: 'tell me a joke about cats', user: 'bob' },
      });

      expect(JSON.parse(res.body)).toEqual({
        answer: SAFE_FALLBACK_TEXT,
        intent: 'out_of_scope',
        escalate: true,
        replayed: false,
      });
    });

    it('rejects a payload without text', async () => {
      const res = await app.inject({ method: 'POST', url: '/chat', payload: { user: 'alice' } });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body)).toEqual({
        error: 'malformed payload',
        detail: 'Malformed web payload: missing text',
      });
    });

    it('rejects invalid JSON', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/chat',
        headers: { 'content-type': 'application/json' },
        payload: '{"text":',
      });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('POST /webhooks/whatsapp', () => {
    const url = `http://${HOST}/webhooks/whatsapp`;
    const params = {
      From: 'whatsapp:+628111222333',
      WaId: '628111222333',
      MessageSid: 'SM-int-1',
      Body: 'halo',
      NumMedia: '0',
    };

    it('replies with TwiML for a signed message', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/webhooks/whatsapp',
        headers: {
          host: HOST,
          'content-type': 'application/x-www-form-urlencoded',
          'x-twilio-signature': twilio.getExpectedTwilioSignature(TWILIO_TOKEN, url, params),
        },
        payload: new URLSearchParams(params).toString(),
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toContain('text/xml');
      expect(res.body).toContain('<Message>Halo dari gateway!</Message>');
    });

    it('rejects an unsigned request with 403', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/webhooks/whatsapp',
        headers: { host: HOST, 'content-type': 'application/x-www-form-urlencoded' },
        payload: new URLSearchParams(params).toString(),
      });

      expect(res.statusCode).toBe(403);
      expect(JSON.parse(res.body)).toEqual({ error: 'invalid request signature' });
    });
  });

  describe('POST /webhooks/discord', () => {
    const timestamp = '1700000000';

    function signed(body: object) {
      const raw = JSON.stringify(body);
      return {
        method: 'POST' as const,
        url: '/webhooks/discord',
        headers: {
          'content-type': 'application/json',
          'x-signature-ed25519': discordKeys.sign(timestamp, raw),
          'x-signature-timestamp': timestamp,
        },
        payload: raw,
      };
    }

    beforeEach(() => {
      fetchImpl.mockReset();
      fetchImpl.mockResolvedValue(new Response(null, { status: 200 }));
    });

    it('answers PING with PONG', async () => {
      const res = await app.inject(signed({ type: 1 }));
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ type: 1 });
    });

    it('acks a command and sends the reply as a follow-up', async () => {
      const res = await app.inject(
        signed({
          type: 2,
          id: '175928847299117063',
          token: 'tok-1',
          application_id: 'app-1',
          member: { user: { id: 'user-9' } },
          data: { name: 'chat', options: [{ name: 'q', type: 3, value: 'halo' }] },
        }),
      );

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ type: 5 });

      await waitUntil(() => fetchImpl.mock.calls.length > 0);
      await followUps.drain();

      expect(fetchImpl).toHaveBeenCalledTimes(1);
      const [target, init] = fetchImpl.mock.calls[0];
      expect(target).toBe('https://discord.test/api/v10/webhooks/app-1/tok-1');
      expect(JSON.parse(init.body)).toEqual({ content: 'Halo dari gateway!', allowed_mentions: { parse: [] } });
    });

    it('rejects a bad signature with 401', async () => {
      const request = signed({ type: 1 });
      const res = await app.inject({ ...request, payload: JSON.stringify({ type: 2 }) });

      expect(res.statusCode).toBe(401);
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });

  describe('health', () => {
    it('GET /health is always ok', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body).status).toBe('ok');
    });

    it('GET /ready skips dependencies that are not configured', async () => {
      const res = await app.inject({ method: 'GET', url: '/ready' });
      const body = JSON.parse(res.body);

      expect(res.statusCode).toBe(200);
      expect(body.status).toBe('ready');
      expect(body.checks).toEqual({ redis: { status: 'skipped' }, llm: { status: 'skipped' } });
    });
  });
});
