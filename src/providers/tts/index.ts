import type { Dispatcher } from 'undici';
import type { Config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import type { Provider, TTSProvider } from './interface.js';
import { SpitchProvider } from './spitch.js';
import { AwarriProvider } from './awarri.js';

export type {
  Provider,
  SpitchVoice,
  SynthesizedAudio,
  SynthesisResult,
  TTSConfig,
  TTSProvider,
} from './interface.js';
export {
  DEFAULT_VOICE_LABEL,
  PROVIDERS,
  PROVIDER_LABELS,
  SPITCH_VOICES,
  isProvider,
  isSpitchVoice,
} from './interface.js';
export * from './errors.js';
export { SpitchProvider } from './spitch.js';
export { AwarriProvider } from './awarri.js';

export type ProviderConfig = Pick<Config, 'spitch' | 'awarri' | 'http'>;

/**
 * Create a TTS provider from the given configuration
 */
export function createTTSProvider(
  provider: Provider,
  config: ProviderConfig,
  dispatcher?: Dispatcher,
): TTSProvider {
  const timeoutMs = config.http.timeoutMs;

  logger.info(`Initializing TTS provider: ${provider}`);

  switch (provider) {
    case 'spitch':
      return new SpitchProvider({ ...config.spitch, timeoutMs, dispatcher });

    case 'awarri':
      return new AwarriProvider({ ...config.awarri, timeoutMs, dispatcher });
  }
}

/**
 * Anything that can hand out the client for a provider
 */
export interface ProviderLookup {
  get(provider: Provider): TTSProvider;
}

/**
 * Lazily builds one client per provider from the process configuration and
 * reuses it. `reconfigure` drops every cached client; the next `get` builds
 * a fresh one from the new configuration.
 */
export class ProviderRegistry implements ProviderLookup {
  private clients = new Map<Provider, TTSProvider>();
  private config: ProviderConfig;
  private dispatcher: Dispatcher | undefined;

  constructor(config: ProviderConfig, options: { dispatcher?: Dispatcher } = {}) {
    this.config = config;
    this.dispatcher = options.dispatcher;
  }

  get(provider: Provider): TTSProvider {
    let client = this.clients.get(provider);
    if (!client) {
      client = createTTSProvider(provider, this.config, this.dispatcher);
      this.clients.set(provider, client);
    }
    return client;
  }

  reconfigure(config: ProviderConfig): void {
    this.config = config;
    this.clients.clear();
    logger.info('TTS provider configuration changed, cached clients dropped');
  }
}
