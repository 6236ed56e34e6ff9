import type { Provider } from '../providers/tts/index.js';
import type { GenerationResult } from './generation.js';

/**
 * The latest unsaved result per provider. Each new result for a provider
 * overwrites its slot; last write wins.
 */
export class SessionState {
  private slots = new Map<Provider, GenerationResult>();

  setCurrent(provider: Provider, result: GenerationResult): void {
    this.slots.set(provider, result);
  }

  getCurrent(provider: Provider): GenerationResult | undefined {
    return this.slots.get(provider);
  }

  /**
   * Empty both slots
   */
  clear(): void {
    this.slots.clear();
  }
}
