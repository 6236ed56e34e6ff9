import { randomUUID } from 'node:crypto';
import { logger } from '../utils/logger.js';
import type { Provider } from '../providers/tts/index.js';
import type { GenerationOutcome, GenerationResult, GenerationService } from './generation.js';
import { HistoryStore } from './history-store.js';
import { SessionState } from './session-state.js';

/**
 * One comparison session: the current unsaved results and the saved
 * history. Created empty; everything goes away with `dispose`.
 */
export class Session {
  readonly id = randomUUID();
  readonly startedAt = new Date();
  private history = new HistoryStore();
  private state = new SessionState();
  private generator: GenerationService;
  private disposed = false;

  constructor(generator: GenerationService) {
    this.generator = generator;
    logger.debug(`Session ${this.id} started`);
  }

  /**
   * Generate with a provider. Only a success replaces that provider's
   * current result; a failure leaves it and the history untouched.
   */
  async generate(provider: Provider, text: string, voice: string | null): Promise<GenerationOutcome> {
    const outcome = await this.generator.generate(provider, text, voice);
    if (outcome.ok && !this.disposed) {
      this.state.setCurrent(provider, outcome.result);
    }
    return outcome;
  }

  current(provider: Provider): GenerationResult | undefined {
    return this.state.getCurrent(provider);
  }

  /**
   * Save the provider's current result to the front of the history
   * @returns the saved result, or undefined when there is nothing to save
   */
  save(provider: Provider): GenerationResult | undefined {
    const result = this.state.getCurrent(provider);
    if (!result) {
      return undefined;
    }
    this.history.save(result);
    logger.info(`Session ${this.id}: saved ${provider} generation (${this.history.size} in history)`);
    return result;
  }

  historyEntries(): readonly GenerationResult[] {
    return this.history.all();
  }

  historyEntry(index: number): GenerationResult | undefined {
    return this.history.at(index);
  }

  get historySize(): number {
    return this.history.size;
  }

  /**
   * Clear the current results. History is kept.
   */
  clear(): void {
    this.state.clear();
  }

  dispose(): void {
    this.disposed = true;
    this.state.clear();
    this.history = new HistoryStore();
    logger.debug(`Session ${this.id} ended`);
  }
}
