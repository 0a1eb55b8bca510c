/**
 * Crosstalk Backend Server
 * Main entry point for the Express application
 */

// Load environment variables FIRST - before any other imports
// This ensures process.env is populated when modules initialize
import { config } from 'dotenv';
config();

import express, { type Request, type Response } from 'express';
import { fileURLToPath } from 'url';
import { createSessionRoutes } from './routes/session-routes.js';
import { requestLogger } from './middleware/request-logger.js';
import { logger, logStartup } from './utils/logger.js';
import { sessionConfig, validateSessionConfig } from './config/session.js';
import { llmConfig, validateLLMConfig } from './config/llm.js';
import { loadCatalog } from './services/catalog/catalog-loader.js';
import { createLiveSession, type LiveSession } from './services/session/live-session.js';

const PORT = process.env.PORT || 3000;

/**
 * Build the Express app around one live session
 */
export function createApp(session: LiveSession): express.Express {
  const app = express();

  // Enable CORS for all routes
  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', process.env.FRONTEND_URL || '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Last-Event-ID');

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json({ limit: '16kb' }));
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: session.state.isEnded ? 'ended' : 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      viewers: session.bus.listenerCount,
      lastEventId: session.bus.lastEventId,
      timeRemainingMs: session.state.timeRemainingMs(),
      engine: session.engine.status,
    });
  });

  app.use('/api', createSessionRoutes(session));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: express.NextFunction) => {
    logger.error({ error: err, path: req.path }, 'Unhandled error');

    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}

/**
 * Server lifecycle
 */

let server: ReturnType<express.Express['listen']> | null = null;
let session: LiveSession | null = null;
let shuttingDown = false;

/**
 * Start the server
 * Validates configuration, loads the catalog, then starts serving and the engine
 */
function start(): void {
  try {
    validateSessionConfig(sessionConfig);
    validateLLMConfig(llmConfig);

    const catalog = loadCatalog(sessionConfig.catalogDir);
    const live = createLiveSession({ config: sessionConfig, catalog, llm: llmConfig });
    session = live;

    logStartup(PORT);
    server = createApp(live).listen(PORT, () => {
      logger.info({ port: PORT, env: process.env.NODE_ENV }, 'Server started');
    });

    // Handle server errors
    server.on('error', (error: Error) => {
      logger.error({ error }, 'Server error');
      process.exit(1);
    });

    live.engine
      .start()
      .then((summary) => {
        logger.info({ summary }, 'Session complete');
        return shutdown('session-ended');
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Session engine crashed');
        return shutdown('engine-error');
      });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 * Stops the engine, flushes and closes viewer streams, then exits
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received');

  try {
    if (session) {
      session.engine.stop();
      await session.engine.start();
      await session.sse.shutdown();
      session.bus.shutdown();
    }

    // Stop accepting new requests
    if (server) {
      await new Promise<void>((resolve) => {
        server?.close(() => resolve());
      });
      logger.info('HTTP server closed');
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

/**
 * Start the server if this file is run directly
 */
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  /**
   * Register shutdown handlers
   */
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    void shutdown('unhandledRejection');
  });

  start();
}

export { start, shutdown };
