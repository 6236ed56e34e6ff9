import { request, type Dispatcher } from 'undici';
import { logger } from '../../utils/logger.js';
import {
  ConfigurationError,
  ProviderError,
  TransportError,
  UnsupportedVoiceError,
  errorMessage,
} from './errors.js';
import { SPITCH_VOICES } from './interface.js';
import type { SpitchVoice, SynthesisResult, TTSConfig, TTSProvider } from './interface.js';

/**
 * Hausa, the only language this tool compares
 */
const SPITCH_LANGUAGE = 'ha';

/**
 * Spitch TTS provider
 * Posts the text and drains the streamed audio response into one buffer
 */
export class SpitchProvider implements TTSProvider {
  readonly name = 'spitch';
  private config: TTSConfig;

  constructor(config: TTSConfig) {
    this.config = config;
  }

  async synthesize(text: string, voice: SpitchVoice | null): Promise<SynthesisResult> {
    const { apiUrl, apiKey, timeoutMs, dispatcher } = this.config;

    if (!apiUrl || !apiKey) {
      return {
        ok: false,
        error: new ConfigurationError('Spitch API key is not configured (SPITCH_API_KEY)'),
      };
    }
    if (voice === null) {
      return { ok: false, error: new UnsupportedVoiceError(null, SPITCH_VOICES) };
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'audio/wav',
        },
        body: JSON.stringify({
          text,
          language: SPITCH_LANGUAGE,
          voice: voice.toLowerCase(),
        }),
        dispatcher,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
    } catch (error) {
      logger.error(`Spitch TTS request failed: ${errorMessage(error)}`);
      return {
        ok: false,
        error: new TransportError(`Spitch request failed: ${errorMessage(error)}`, { cause: error }),
      };
    }

    try {
      if (response.statusCode !== 200) {
        const errorBody = await response.body.text();
        logger.error(`Spitch TTS error (${response.statusCode}): ${errorBody}`);
        return {
          ok: false,
          error: new ProviderError(`Spitch TTS error (${response.statusCode}): ${errorBody}`, {
            status: response.statusCode,
            body: errorBody,
          }),
        };
      }

      // Synthesis is only complete once the stream is exhausted
      const chunks: Buffer[] = [];
      for await (const chunk of response.body) {
        chunks.push(chunk);
      }
      const bytes = Buffer.concat(chunks);

      logger.debug(`Spitch TTS synthesized ${text.length} chars into ${bytes.length} bytes`);
      return { ok: true, audio: { encoding: 'raw', bytes } };
    } catch (error) {
      logger.error(`Spitch TTS response failed: ${errorMessage(error)}`);
      return {
        ok: false,
        error: new TransportError(`Spitch response failed: ${errorMessage(error)}`, { cause: error }),
      };
    }
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey && this.config.apiUrl);
  }
}
