import { once } from 'events';
import twilio from 'twilio';
import { afterEach, describe, expect, it, vi } from 'vitest';
import WebSocket from 'ws';

import { startServer, type RunningServer } from './server';
import { FakeAgent } from './testing/fake-agent';
import { loadConfig, type AppConfig } from './utils/env';

const PUBLIC_URL = 'https://bridge.example.com';
const AUTH_TOKEN = 'test-secret';

function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    PUBLIC_URL,
    TWILIO_AUTH_TOKEN: AUTH_TOKEN,
    GEMINI_API_KEY: 'test-key',
    HOST: '127.0.0.1',
    PORT: '0',
    ...env,
  });
}

describe('server', () => {
  let running: RunningServer | null = null;
  const agents: FakeAgent[] = [];

  afterEach(async () => {
    await running?.stop();
    running = null;
    agents.length = 0;
  });

  async function start(env: Record<string, string> = {}): Promise<string> {
    running = await startServer(testConfig(env), {
      createAgent: () => {
        const agent = new FakeAgent();
        agents.push(agent);
        return agent;
      },
    });
    const address = running.httpServer.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    return `127.0.0.1:${address.port}`;
  }

  it('answers health checks', async () => {
    const host = await start();
    const res = await fetch(`http://${host}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('rejects unsigned webhooks', async () => {
    const host = await start();
    const res = await fetch(`http://${host}/incoming`, {
      method: 'POST',
      body: new URLSearchParams({ From: '+15550100', CallSid: 'CA-test' }),
    });

    expect(res.status).toBe(403);
    expect(await res.text()).toBe('Invalid signature');
  });

  it('answers a signed webhook with stream TwiML', async () => {
    const host = await start();
    const params = { From: '+15550100', CallSid: 'CA-test' };
    const signature = twilio.getExpectedTwilioSignature(AUTH_TOKEN, `${PUBLIC_URL}/incoming`, params);

    const res = await fetch(`http://${host}/incoming`, {
      method: 'POST',
      headers: { 'X-Twilio-Signature': signature },
      body: new URLSearchParams(params),
    });
    const body = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^text\/xml/);
    expect(body).toContain('<Say>Connecting you now.</Say>');
    expect(body).toContain(
      '<Connect><Stream url="wss://bridge.example.com/media-stream"><Parameter name="caller" value="+15550100"/></Stream></Connect>',
    );
  });

  it('skips signature checks when validation is disabled', async () => {
    const host = await start({ ENABLE_WEBHOOK_VALIDATION: 'false' });
    const res = await fetch(`http://${host}/incoming`, {
      method: 'POST',
      body: new URLSearchParams({ CallSid: 'CA-test' }),
    });

    expect(res.status).toBe(200);
    expect(await res.text()).toContain('value="unknown"');
  });

  it('bridges a media stream connection to the agent', async () => {
    const host = await start();
    const ws = new WebSocket(`ws://${host}/media-stream`);
    const outbound: unknown[] = [];
    ws.on('message', (data) => outbound.push(JSON.parse(String(data))));
    await once(ws, 'open');

    ws.send(JSON.stringify({ event: 'connected', protocol: 'Call' }));
    ws.send(JSON.stringify({ event: 'start', start: { streamSid: 'MZ-e2e', callSid: 'CA-e2e' } }));
    for (let i = 0; i < 15; i++) {
      ws.send(JSON.stringify({ event: 'media', media: { payload: Buffer.alloc(160, 0xff).toString('base64') } }));
    }

    await vi.waitFor(() => expect(agents[0]?.sent).toHaveLength(1));
    expect(agents[0].sent[0].pcm).toHaveLength(9600);

    agents[0].events.push({ type: 'audio', pcm: Buffer.alloc(480) });
    await vi.waitFor(() => expect(outbound).toHaveLength(1));
    expect(outbound[0]).toEqual({
      event: 'media',
      streamSid: 'MZ-e2e',
      media: { payload: Buffer.alloc(80, 0xff).toString('base64') },
    });

    ws.close();
    await vi.waitFor(() => expect(agents[0].closeCalls).toBe(1));
  });

  it('closes the Twilio socket when the agent cannot connect', async () => {
    running = await startServer(testConfig(), {
      createAgent: () => {
        const agent = new FakeAgent();
        agent.connectError = new Error('denied');
        return agent;
      },
    });
    const address = running.httpServer.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');

    const ws = new WebSocket(`ws://127.0.0.1:${address.port}/media-stream`);
    const [code] = await once(ws, 'close');
    expect(code).toBe(1005);
  });
});
