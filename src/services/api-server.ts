import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { AUDIO_MIME_TYPE, decodeAudio } from '../utils/audio.js';
import {
  DEFAULT_VOICE_LABEL,
  PROVIDERS,
  PROVIDER_LABELS,
  SPITCH_VOICES,
  isProvider,
} from '../providers/tts/index.js';
import type { ErrorKind, Provider } from '../providers/tts/index.js';
import type { GenerationResult, GenerationService } from './generation.js';
import type { Session } from './session.js';

export interface ApiServerConfig {
  port: number;
  /**
   * Interface to bind; all interfaces when omitted
   */
  host?: string;
}

const generateBodySchema = z.object({
  provider: z.enum(PROVIDERS),
  text: z.string(),
  voice: z.string().nullable().optional(),
});

const FAILURE_STATUS: Record<ErrorKind, number> = {
  'empty-input': 400,
  'text-too-long': 400,
  'unsupported-voice': 400,
  configuration: 503,
  transport: 504,
  provider: 502,
};

export interface ResultSummary {
  text: string;
  provider: Provider;
  providerLabel: string;
  voice: string | null;
  voiceLabel: string;
  latencySeconds: number;
  createdAt: string;
}

export function summarizeResult(result: GenerationResult): ResultSummary {
  return {
    text: result.text,
    provider: result.provider,
    providerLabel: PROVIDER_LABELS[result.provider],
    voice: result.voice,
    voiceLabel: result.voice ?? DEFAULT_VOICE_LABEL,
    latencySeconds: result.latencySeconds,
    createdAt: result.createdAt.toISOString(),
  };
}

/**
 * REST API over one comparison session
 *
 * REST endpoints:
 *   GET    /health                   — Health check and provider availability
 *   GET    /voices                   — Voices per provider
 *   POST   /generate                 — Synthesize (body: { provider, text, voice? })
 *   GET    /current                  — Current unsaved results
 *   GET    /current/:provider/audio  — Play the current result
 *   POST   /current/:provider/save   — Save the current result to history
 *   POST   /clear                    — Clear the current results
 *   GET    /history                  — Saved results, newest first
 *   GET    /history/:index/audio     — Play a saved result
 *   DELETE /session                  — End the session and start a new one
 */
export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;
  private config: ApiServerConfig;
  private generator: GenerationService;
  private createSession: () => Session;
  private session: Session;

  constructor(generator: GenerationService, createSession: () => Session, config: ApiServerConfig) {
    this.generator = generator;
    this.createSession = createSession;
    this.session = createSession();
    this.config = config;
    this.app = express();
    this.app.use(express.json());
    this.setupRoutes();
    this.app.use(this.handleError);
  }

  /**
   * Start the API server
   */
  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = createServer(this.app);
      this.server.listen(this.config.port, this.config.host, () => {
        logger.info(`API server listening on port ${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the API server and end the session
   */
  async stop(): Promise<void> {
    this.session.dispose();
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          logger.info('API server stopped');
          resolve();
        });
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  /**
   * Port actually bound, which differs from the configured one when that is 0
   */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  get currentSession(): Session {
    return this.session;
  }

  private setupRoutes(): void {
    this.app.get('/health', async (_req: Request, res: Response) => {
      const providers = await this.generator.availability();
      res.json({ status: 'ok', session: this.session.id, providers });
    });

    this.app.get('/voices', (_req: Request, res: Response) => {
      res.json({ spitch: SPITCH_VOICES, awarri: [DEFAULT_VOICE_LABEL] });
    });

    this.app.post('/generate', async (req: Request, res: Response) => {
      const parsed = generateBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        });
        return;
      }

      const { provider, text, voice } = parsed.data;
      const outcome = await this.session.generate(provider, text, voice ?? null);
      if (!outcome.ok) {
        const { failure } = outcome;
        res.status(FAILURE_STATUS[failure.kind]).json({
          error: failure.message,
          kind: failure.kind,
          provider: failure.provider,
          latencySeconds: failure.latencySeconds,
        });
        return;
      }

      res.json({
        status: 'generated',
        result: summarizeResult(outcome.result),
        audioBase64: outcome.result.audioBase64,
      });
    });

    this.app.get('/current', (_req: Request, res: Response) => {
      const current: Record<string, ResultSummary | null> = {};
      for (const provider of PROVIDERS) {
        const result = this.session.current(provider);
        current[provider] = result ? summarizeResult(result) : null;
      }
      res.json(current);
    });

    this.app.get('/current/:provider/audio', (req: Request, res: Response) => {
      const provider = req.params.provider;
      if (!isProvider(provider)) {
        res.status(404).json({ error: `Unknown provider: ${provider}` });
        return;
      }

      const result = this.session.current(provider);
      if (!result) {
        res.status(404).json({ error: `No current ${PROVIDER_LABELS[provider]} generation` });
        return;
      }
      this.sendAudio(res, result);
    });

    this.app.post('/current/:provider/save', (req: Request, res: Response) => {
      const provider = req.params.provider;
      if (!isProvider(provider)) {
        res.status(404).json({ error: `Unknown provider: ${provider}` });
        return;
      }

      const saved = this.session.save(provider);
      if (!saved) {
        res.status(404).json({ error: `No current ${PROVIDER_LABELS[provider]} generation to save` });
        return;
      }
      res.status(201).json({
        status: 'saved',
        result: summarizeResult(saved),
        total: this.session.historySize,
      });
    });

    this.app.post('/clear', (_req: Request, res: Response) => {
      this.session.clear();
      res.json({ status: 'cleared' });
    });

    this.app.get('/history', (_req: Request, res: Response) => {
      const entries = this.session.historyEntries().map(summarizeResult);
      res.json({ total: entries.length, entries });
    });

    this.app.get('/history/:index/audio', (req: Request, res: Response) => {
      const index = Number(req.params.index);
      const result = this.session.historyEntry(index);
      if (!result) {
        res.status(404).json({ error: `No history entry at ${req.params.index}` });
        return;
      }
      this.sendAudio(res, result);
    });

    this.app.delete('/session', (_req: Request, res: Response) => {
      const previous = this.session;
      previous.dispose();
      this.session = this.createSession();
      logger.info(`Session ${previous.id} replaced by ${this.session.id}`);
      res.json({ status: 'restarted', session: this.session.id });
    });
  }

  private sendAudio(res: Response, result: GenerationResult): void {
    res.type(AUDIO_MIME_TYPE).send(decodeAudio(result.audioBase64));
  }

  private handleError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    // express.json() reports unparsable bodies as SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    const msg = err instanceof Error ? err.message : String(err);
    logger.error(`Request failed: ${msg}`);
    res.status(500).json({ error: msg });
  };
}
