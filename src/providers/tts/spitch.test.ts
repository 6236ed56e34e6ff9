import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { SpitchProvider } from './spitch.js';
import { ConfigurationError, ProviderError, TransportError, UnsupportedVoiceError } from './errors.js';
import type { TTSConfig } from './interface.js';

const ORIGIN = 'https://spitch.test';
const PATH = '/v1/speech';

describe('SpitchProvider', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function createProvider(overrides: Partial<TTSConfig> = {}): SpitchProvider {
    return new SpitchProvider({
      apiUrl: `${ORIGIN}${PATH}`,
      apiKey: 'test-secret',
      timeoutMs: 1000,
      dispatcher: agent,
      ...overrides,
    });
  }

  it('drains the streamed audio into one buffer', async () => {
    const audio = Buffer.from([0x52, 0x49, 0x46, 0x46, 0x24, 0x00, 0x00, 0x00]);
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(200, audio);

    const result = await createProvider().synthesize('Sannu da zuwa', 'Amina');

    expect(result).toEqual({ ok: true, audio: { encoding: 'raw', bytes: audio } });
  });

  it('sends Hausa with the lowercased voice', async () => {
    let sent: unknown;
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .reply(200, (opts) => {
        sent = JSON.parse(String(opts.body));
        return Buffer.from('RIFF');
      });

    await createProvider().synthesize('Ina kwana?', 'Zainab');

    expect(sent).toEqual({ text: 'Ina kwana?', language: 'ha', voice: 'zainab' });
  });

  it('returns a ConfigurationError without calling out when the key is missing', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(200, Buffer.from('RIFF'));

    const result = await createProvider({ apiKey: undefined }).synthesize('Sannu', 'Hasan');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toBeInstanceOf(ConfigurationError);
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('rejects a missing voice', async () => {
    const result = await createProvider().synthesize('Sannu', null);

    expect(!result.ok && result.error).toBeInstanceOf(UnsupportedVoiceError);
  });

  it('maps a non-200 status to a ProviderError', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(401, 'invalid api key');

    const result = await createProvider().synthesize('Sannu', 'Aliyu');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(ProviderError);
    expect(result.error).toMatchObject({
      kind: 'provider',
      status: 401,
      body: 'invalid api key',
      message: 'Spitch TTS error (401): invalid api key',
    });
  });

  it('maps a network failure to a TransportError', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .replyWithError(new Error('connection reset'));

    const result = await createProvider().synthesize('Sannu', 'Aliyu');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error.kind).toBe('transport');
  });

  it('reports availability from its credentials', async () => {
    expect(await createProvider().isAvailable()).toBe(true);
    expect(await createProvider({ apiKey: undefined }).isAvailable()).toBe(false);
  });
});

describe('SpitchProvider transport timeout', () => {
  let server: Server;
  let apiUrl: string;
  let handler: (req: IncomingMessage, res: ServerResponse) => void;

  beforeEach(async () => {
    handler = () => {};
    server = createServer((req, res) => handler(req, res));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    apiUrl = `http://127.0.0.1:${address && typeof address === 'object' ? address.port : 0}/v1/speech`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('reports an expired headers timeout as a TransportError', async () => {
    const provider = new SpitchProvider({ apiUrl, apiKey: 'test-secret', timeoutMs: 200 });

    const result = await provider.synthesize('Sannu', 'Hasan');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error.message).toBe('Spitch request failed: Headers Timeout Error');
  });

  it('reports a stalled audio stream as a TransportError', async () => {
    handler = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'audio/wav' });
      res.write(Buffer.from('RIFF'));
    };
    const provider = new SpitchProvider({ apiUrl, apiKey: 'test-secret', timeoutMs: 200 });

    const result = await provider.synthesize('Sannu', 'Hasan');

    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error.message).toBe('Spitch response failed: Body Timeout Error');
  });
});
