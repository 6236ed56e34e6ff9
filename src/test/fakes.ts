import { vi } from 'vitest';
import type { Provider, SynthesisResult, TTSProvider } from '../providers/tts/index.js';
import type { GenerationResult } from '../services/generation.js';

export const WAV_BYTES = Buffer.from('RIFF', 'ascii');
export const WAV_BASE64 = 'UklGRg==';

/**
 * In-memory provider whose synthesize is a vitest mock
 */
export function fakeProvider(
  name: Provider,
  respond: SynthesisResult = { ok: true, audio: { encoding: 'raw', bytes: WAV_BYTES } },
) {
  const synthesize = vi.fn<TTSProvider['synthesize']>(async () => respond);
  const provider: TTSProvider = {
    name,
    synthesize,
    isAvailable: async () => true,
  };
  return { provider, synthesize };
}

/**
 * Lookup over a fixed pair of providers
 */
export function lookup(providers: Record<Provider, TTSProvider>) {
  return { get: (provider: Provider) => providers[provider] };
}

/**
 * Clock returning the given millisecond readings in order
 */
export function ticking(...readings: number[]): () => number {
  return () => readings.shift() ?? 0;
}

export function makeResult(overrides: Partial<GenerationResult> = {}): GenerationResult {
  return Object.freeze({
    text: 'Sannu da zuwa',
    provider: 'spitch',
    voice: 'Amina',
    audioBase64: WAV_BASE64,
    latencySeconds: 0.5,
    createdAt: new Date('2024-05-01T10:00:00.000Z'),
    ...overrides,
  });
}
