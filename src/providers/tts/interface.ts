import type { Dispatcher } from 'undici';
import type { SynthesisError } from './errors.js';

export const PROVIDERS = ['spitch', 'awarri'] as const;

/**
 * One of the two external text-to-speech backends
 */
export type Provider = (typeof PROVIDERS)[number];

export const PROVIDER_LABELS: Record<Provider, string> = {
  spitch: 'Spitch AI',
  awarri: 'Awarri',
};

/**
 * Voices Spitch offers for Hausa. Closed set.
 */
export const SPITCH_VOICES = ['Hasan', 'Amina', 'Zainab', 'Aliyu'] as const;

export type SpitchVoice = (typeof SPITCH_VOICES)[number];

/**
 * Label shown for providers without voice selection
 */
export const DEFAULT_VOICE_LABEL = 'Default';

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((provider) => provider === value);
}

export function isSpitchVoice(value: string): value is SpitchVoice {
  return SPITCH_VOICES.some((voice) => voice === value);
}

/**
 * Audio as a provider hands it back: Spitch streams raw bytes, Awarri
 * embeds base64 in a JSON envelope.
 */
export type SynthesizedAudio =
  | { encoding: 'raw'; bytes: Buffer }
  | { encoding: 'base64'; data: string };

export type SynthesisResult =
  | { ok: true; audio: SynthesizedAudio }
  | { ok: false; error: SynthesisError };

/**
 * TTS provider interface
 */
export interface TTSProvider {
  /**
   * Provider name for logging and identification
   */
  readonly name: Provider;

  /**
   * Convert text to speech audio. Performs exactly one network call and
   * never rejects: failures come back as `{ ok: false }`.
   * @param voice Spitch voice, or null for providers without voice selection
   */
  synthesize(text: string, voice: SpitchVoice | null): Promise<SynthesisResult>;

  /**
   * Check if the provider is properly configured
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Common TTS configuration options
 */
export interface TTSConfig {
  apiUrl?: string;
  apiKey?: string;
  /**
   * Headers and body timeout for the provider call
   */
  timeoutMs: number;
  /**
   * undici dispatcher; defaults to the global one
   */
  dispatcher?: Dispatcher;
}
