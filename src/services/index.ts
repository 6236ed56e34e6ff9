export { GenerationService, DEFAULT_MAX_TEXT_LENGTH } from './generation.js';
export type {
  GenerationFailure,
  GenerationOutcome,
  GenerationResult,
  GenerationServiceOptions,
} from './generation.js';
export { HistoryStore } from './history-store.js';
export { SessionState } from './session-state.js';
export { Session } from './session.js';
export { ApiServer } from './api-server.js';
export type { ApiServerConfig } from './api-server.js';
