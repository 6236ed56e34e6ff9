import { config, reloadConfig } from './config.js';
import logger from './utils/logger.js';
import { ProviderRegistry } from './providers/tts/index.js';
import { ApiServer, GenerationService, Session } from './services/index.js';

// Global error handlers to prevent silent crashes
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.stack || error.message}`);
});
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${String(reason)}`);
});

const registry = new ProviderRegistry(config);
const generator = new GenerationService({
  providers: registry,
  maxTextLength: config.generation.maxTextLength,
});
const server = new ApiServer(generator, () => new Session(generator), { port: config.server.port });

const shutdown = async (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  await server.stop();
  process.exit(0);
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

// Pick up changed provider settings and text limit without restarting.
// The port only changes on restart.
process.on('SIGHUP', () => {
  try {
    const next = reloadConfig();
    registry.reconfigure(next);
    generator.reconfigure({ maxTextLength: next.generation.maxTextLength });
    logger.info('Configuration reloaded');
  } catch (error) {
    logger.error(`Config reload failed, keeping previous configuration: ${String(error)}`);
  }
});

server.start().catch((error: unknown) => {
  logger.error(`Failed to start API server: ${String(error)}`);
  process.exit(1);
});
