import { Server, createServer } from 'http';
import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { GameEngine, GameSnapshot } from '../../shared/core';
import { Logger, createLogger } from '../../shared/logger';

export interface StatusApiOptions {
  version: string;
  allowedOrigins: string[];
}

export interface StatusPayload {
  gridSize: number;
  maxPlayers: number;
  occupied: number;
  obstacles: Array<{ row: number; col: number }>;
  players: Array<{ symbol: string; health: number; row: number; col: number }>;
  grid: string[];
}

export function toStatusPayload(snapshot: GameSnapshot): StatusPayload {
  return {
    gridSize: snapshot.gridSize,
    maxPlayers: snapshot.maxPlayers,
    occupied: snapshot.occupied,
    obstacles: snapshot.obstacles.map(({ row, col }) => ({ row, col })),
    players: snapshot.players.map(({ symbol, health, row, col }) => ({ symbol, health, row, col })),
    grid: [...snapshot.rows],
  };
}

/**
 * Read-only HTTP view of the running game
 */
export function createStatusApp(engine: GameEngine, options: StatusApiOptions, logger: Logger = createLogger('StatusApi')): Express {
  const app = express();

  // Security: Helmet for security headers
  app.use(helmet());

  // Security: CORS - restrict to allowed origins
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || options.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        logger.debug('CORS rejected origin', { origin });
        callback(new Error('Not allowed by CORS'));
      }
    },
  }));

  // Security: Rate limiting
  app.use('/api', rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 120,
    message: { error: 'Too many requests, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/version', (_req, res) => {
    res.json({ version: options.version });
  });

  app.get('/api/status', async (_req, res) => {
    try {
      const snapshot = await engine.snapshot();
      res.json(toStatusPayload(snapshot));
    } catch (error) {
      logger.error('Error reading game status', error);
      res.status(500).json({ error: 'Failed to read game status' });
    }
  });

  return app;
}

/**
 * Serve the status app beside the game
 *
 * Listen failures (a taken port) are logged; the game server keeps running
 * without the status API.
 */
export function listenStatusApi(app: Express, port: number, host: string, logger: Logger = createLogger('StatusApi')): Server {
  const server = createServer(app);
  server.on('error', (error) => logger.error('Status API failed', error));
  server.listen(port, host, () => {
    logger.info(`Status API listening on port ${port}`);
  });
  return server;
}
