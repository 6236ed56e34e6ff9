import { logger } from '../utils/logger.js';
import { decodeAudio, toBase64Audio } from '../utils/audio.js';
import {
  EmptyInputError,
  PROVIDER_LABELS,
  ProviderError,
  SPITCH_VOICES,
  TextTooLongError,
  UnsupportedVoiceError,
  describeFailure,
  errorMessage,
  isSpitchVoice,
} from '../providers/tts/index.js';
import type {
  ErrorKind,
  Provider,
  ProviderLookup,
  SpitchVoice,
  SynthesisError,
  SynthesisResult,
} from '../providers/tts/index.js';

export const DEFAULT_MAX_TEXT_LENGTH = 500;

/**
 * One synthesized clip. Frozen once created.
 */
export interface GenerationResult {
  readonly text: string;
  readonly provider: Provider;
  /**
   * Set for Spitch, always null for Awarri
   */
  readonly voice: SpitchVoice | null;
  readonly audioBase64: string;
  readonly latencySeconds: number;
  readonly createdAt: Date;
}

export interface GenerationFailure {
  readonly provider: Provider;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly error: SynthesisError;
  /**
   * Always 0: failed calls have no meaningful latency
   */
  readonly latencySeconds: 0;
}

export type GenerationOutcome =
  | { ok: true; result: GenerationResult }
  | { ok: false; failure: GenerationFailure };

export interface GenerationServiceOptions {
  providers: ProviderLookup;
  maxTextLength?: number;
  /**
   * Millisecond clock used for latency measurement
   */
  now?: () => number;
}

/**
 * Runs one synthesis request against a provider and turns whatever comes
 * back into a latency-stamped result or a tagged failure. Never rejects.
 */
export class GenerationService {
  private providers: ProviderLookup;
  private maxTextLength: number;
  private now: () => number;

  constructor(options: GenerationServiceOptions) {
    this.providers = options.providers;
    this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
    this.now = options.now ?? (() => performance.now());
  }

  async generate(
    provider: Provider,
    text: string,
    voice: string | null,
  ): Promise<GenerationOutcome> {
    const validated = this.validate(provider, text, voice);
    if (!validated.ok) {
      return this.fail(provider, validated.error);
    }

    const client = this.providers.get(provider);
    const start = this.now();
    let synthesis: SynthesisResult;
    try {
      synthesis = await client.synthesize(text, validated.voice);
    } catch (error) {
      // Providers report failures as values; a rejection here is a bug in one
      synthesis = {
        ok: false,
        error: new ProviderError(`Unexpected ${provider} failure: ${errorMessage(error)}`),
      };
    }
    const latencySeconds = Math.max(0, (this.now() - start) / 1000);

    if (!synthesis.ok) {
      return this.fail(provider, synthesis.error);
    }

    const audioBase64 = toBase64Audio(synthesis.audio);
    if (decodeAudio(audioBase64).length === 0) {
      return this.fail(provider, new ProviderError(`${PROVIDER_LABELS[provider]} returned no audio`));
    }

    const result: GenerationResult = Object.freeze({
      text,
      provider,
      voice: validated.voice,
      audioBase64,
      latencySeconds,
      createdAt: new Date(),
    });

    logger.info(
      `${PROVIDER_LABELS[provider]} generated ${text.length} chars in ${latencySeconds.toFixed(2)}s`,
    );
    return { ok: true, result };
  }

  /**
   * Apply a new text limit; takes effect from the next call
   */
  reconfigure(options: { maxTextLength: number }): void {
    this.maxTextLength = options.maxTextLength;
  }

  /**
   * Whether each provider has the configuration it needs
   */
  async availability(): Promise<Record<Provider, boolean>> {
    const [spitch, awarri] = await Promise.all([
      this.providers.get('spitch').isAvailable(),
      this.providers.get('awarri').isAvailable(),
    ]);
    return { spitch, awarri };
  }

  private validate(
    provider: Provider,
    text: string,
    voice: string | null,
  ): { ok: true; voice: SpitchVoice | null } | { ok: false; error: SynthesisError } {
    if (text.trim().length === 0) {
      return { ok: false, error: new EmptyInputError() };
    }

    // Code points, not UTF-16 units
    const length = [...text].length;
    if (length > this.maxTextLength) {
      return { ok: false, error: new TextTooLongError(length, this.maxTextLength) };
    }

    if (provider === 'awarri') {
      if (voice !== null) {
        logger.debug(`Awarri has no voice selection, ignoring voice '${voice}'`);
      }
      return { ok: true, voice: null };
    }

    if (voice === null || !isSpitchVoice(voice)) {
      return { ok: false, error: new UnsupportedVoiceError(voice, SPITCH_VOICES) };
    }
    return { ok: true, voice };
  }

  private fail(provider: Provider, error: SynthesisError): GenerationOutcome {
    const message = describeFailure(PROVIDER_LABELS[provider], error);
    logger.warn(message);
    return {
      ok: false,
      failure: { provider, kind: error.kind, message, error, latencySeconds: 0 },
    };
  }
}
