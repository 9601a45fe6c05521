import { beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { buildRelay, createApp } from '../../src/app';
import type { RelayComponents } from '../../src/app';
import { validateEnv } from '../../src/config/relay.env.config';
import { FakeTransport, assistantReply, run } from '../helpers/fake-transport';

const env = validateEnv({
  NODE_ENV: 'test',
  ACCESS_TOKEN: 'test-token',
  PHONE_NUMBER_ID: '555000',
  VERIFY_TOKEN: 'test-verify',
  OPENAI_API_KEY: 'test-key',
  OPENAI_ASSISTANT_ID: 'asst_test'
});

const inbound = (from: string, body: string) => ({
  object: 'whatsapp_business_account',
  entry: [
    {
      id: 'WABA_ID',
      changes: [
        {
          field: 'messages',
          value: {
            messaging_product: 'whatsapp',
            contacts: [{ wa_id: from, profile: { name: 'Alice' } }],
            messages: [{ from, id: 'wamid.1', timestamp: '1700000000', type: 'text', text: { body } }]
          }
        }
      ]
    }
  ]
});

describe('Relay API', () => {
  let transport: FakeTransport;
  let components: RelayComponents;
  let app: Express;

  beforeEach(() => {
    transport = new FakeTransport()
      .on('POST', '/threads', { status: 200, data: { id: 'thread_1' } })
      .on('POST', '/threads/thread_1/messages', { status: 200, data: { id: 'msg_1' } })
      .on('POST', '/threads/thread_1/runs', { status: 200, data: run('queued') })
      .on('GET', '/threads/thread_1/runs/run_1', { status: 200, data: run('completed') })
      .on('GET', '/threads/thread_1/messages', { status: 200, data: assistantReply('Hi there') })
      .on('POST', '/555000/messages', { status: 200, data: { messages: [{ id: 'wamid.out' }] } });

    components = buildRelay(env, { adapter: transport.adapter, sleep: async () => {} });
    app = createApp(components);
  });

  describe('GET /webhook', () => {
    it('echoes the challenge when the token matches', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify', 'hub.challenge': '1158201444' });

      expect(res.status).toBe(200);
      expect(res.text).toBe('1158201444');
    });

    it('answers 403 on a wrong token', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '1158201444' });

      expect(res.status).toBe(403);
      expect(res.text).toBe('Forbidden');
    });
  });

  describe('POST /webhook', () => {
    it('relays the assistant reply back to the sender', async () => {
      const res = await request(app).post('/webhook').send(inbound('111', 'Hello'));

      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');

      expect(transport.calls('POST', '/threads/thread_1/messages')[0].body).toEqual({
        role: 'user',
        content: 'Hello'
      });

      const sends = transport.calls('POST', '/555000/messages');
      expect(sends).toHaveLength(1);
      expect(sends[0].body).toEqual({
        messaging_product: 'whatsapp',
        to: '111',
        type: 'text',
        text: { body: 'Hi there' }
      });
    });

    it('reuses the thread for a second message from the same user', async () => {
      await request(app).post('/webhook').send(inbound('111', 'Hello'));
      await request(app).post('/webhook').send(inbound('111', 'Again'));

      expect(transport.calls('POST', '/threads')).toHaveLength(1);
      expect(transport.calls('POST', '/555000/messages')).toHaveLength(2);
      expect(components.directory.size()).toBe(1);
    });

    it('acknowledges other products without calling out', async () => {
      const res = await request(app).post('/webhook').send({ object: 'page', entry: [] });

      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');
      expect(transport.requests).toHaveLength(0);
    });

    it('acknowledges a body that is not valid JSON', async () => {
      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .send('{"object":');

      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');
      expect(transport.requests).toHaveLength(0);
    });

    it('still answers 200 when the assistant fails', async () => {
      transport = new FakeTransport().on('POST', '/threads', { status: 500 });
      app = createApp(buildRelay(env, { adapter: transport.adapter, sleep: async () => {} }));

      const res = await request(app).post('/webhook').send(inbound('111', 'Hello'));

      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');
      expect(transport.calls('POST', '/555000/messages')).toHaveLength(0);
    });
  });

  describe('status endpoints', () => {
    it('GET /health reports the tracked threads', async () => {
      await request(app).post('/webhook').send(inbound('111', 'Hello'));

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.threads_count).toBe(1);
      expect(typeof res.body.timestamp).toBe('string');
    });

    it('GET / returns the service banner', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        message: 'WhatsApp Bot with OpenAI Assistant',
        status: 'running',
        version: '2.0.0'
      });
    });

    it('answers unknown routes with a 404 envelope', async () => {
      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('NOT_FOUND');
      expect(res.body.error.message).toBe('Route GET /nope not found');
    });
  });
});
