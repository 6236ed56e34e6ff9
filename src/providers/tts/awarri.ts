import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { ConfigurationError, ProviderError, TransportError, errorMessage } from './errors.js';
import type { SpitchVoice, SynthesisResult, TTSConfig, TTSProvider } from './interface.js';

const AWARRI_LANGUAGE = 'hausa';

/**
 * Success envelope. The audio is already base64 and is passed on as-is.
 */
const awarriResponseSchema = z.object({
  base64_data: z.string(),
});

/**
 * Standard alphabet, padded, no whitespace, at least one byte: decoding and
 * re-encoding must give back the same string.
 */
const base64AudioSchema = z
  .string()
  .min(1)
  .base64()
  .refine((data) => Buffer.from(data, 'base64').toString('base64') === data);

/**
 * Awarri TTS provider
 * Plain JSON POST; the voice is fixed by the provider
 */
export class AwarriProvider implements TTSProvider {
  readonly name = 'awarri';
  private config: TTSConfig;

  constructor(config: TTSConfig) {
    this.config = config;
  }

  async synthesize(text: string, _voice: SpitchVoice | null): Promise<SynthesisResult> {
    const { apiUrl, apiKey, timeoutMs, dispatcher } = this.config;

    if (!apiUrl || !apiKey) {
      return {
        ok: false,
        error: new ConfigurationError(
          'Awarri API credentials not configured (AWARRI_TTS_URL, AWARRI_API_KEY)',
        ),
      };
    }

    let response: Dispatcher.ResponseData;
    let responseText: string;
    try {
      response = await request(apiUrl, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          api_key: apiKey,
          audio_txt: text,
          lang: AWARRI_LANGUAGE,
        }),
        dispatcher,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      responseText = await response.body.text();
    } catch (error) {
      logger.error(`Awarri TTS request failed: ${errorMessage(error)}`);
      return {
        ok: false,
        error: new TransportError(`Awarri request failed: ${errorMessage(error)}`, { cause: error }),
      };
    }

    if (response.statusCode !== 200) {
      logger.error(`Awarri API error (${response.statusCode}): ${responseText}`);
      return {
        ok: false,
        error: new ProviderError(`Awarri API error: ${response.statusCode} - ${responseText}`, {
          status: response.statusCode,
          body: responseText,
        }),
      };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(responseText);
    } catch {
      logger.error('Awarri response is not valid JSON');
      return {
        ok: false,
        error: new ProviderError('Awarri response is not valid JSON', {
          status: response.statusCode,
          body: responseText,
        }),
      };
    }

    const parsed = awarriResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logger.error("No 'base64_data' in Awarri response");
      return {
        ok: false,
        error: new ProviderError("No 'base64_data' in Awarri response", {
          status: response.statusCode,
          body: responseText,
        }),
      };
    }

    const audio = base64AudioSchema.safeParse(parsed.data.base64_data);
    if (!audio.success) {
      logger.error("Awarri 'base64_data' is not canonical standard base64");
      return {
        ok: false,
        error: new ProviderError("Awarri 'base64_data' is not valid base64 audio", {
          status: response.statusCode,
          body: responseText,
        }),
      };
    }

    logger.debug(`Awarri TTS synthesized ${text.length} chars`);
    return { ok: true, audio: { encoding: 'base64', data: audio.data } };
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey && this.config.apiUrl);
  }
}
