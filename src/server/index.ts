#!/usr/bin/env node
import 'dotenv/config';
import { Server } from 'http';
import { readFileSync } from 'fs';
import { join } from 'path';
import { GameEngine } from '../shared/core';
import { Logger } from '../shared/logger';
import { isGameError, GameErrorCode } from '../shared/errors';
import { ArenaServer } from './ArenaServer';
import { ServerConfig, loadConfig } from './config';
import { createStatusApp, listenStatusApi } from './http/statusApi';

// Read version from package.json
let SERVER_VERSION = '0.0.0';
try {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    SERVER_VERSION = packageJson.version;
  }
} catch {
  console.warn('Could not read package.json for version');
}

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (isGameError(error, GameErrorCode.INVALID_CONFIG)) {
      console.error(`${error.message}\nUsage: grid-brawl <port>`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

const logger = new Logger('grid-brawl', config.logLevel);
const engine = new GameEngine({ logger: logger.child('Engine') });
const arenaServer = new ArenaServer(engine, logger.child('ArenaServer'));

let statusServer: Server | null = null;

async function start(): Promise<void> {
  const address = await arenaServer.listen(config.port, config.host);
  logger.info(`Server started on port ${address.port}. Waiting for players...`, {
    version: SERVER_VERSION,
    obstacles: engine.arena.obstacleCount,
  });

  if (config.statusPort !== null) {
    const statusLogger = logger.child('StatusApi');
    const app = createStatusApp(engine, { version: SERVER_VERSION, allowedOrigins: config.allowedOrigins }, statusLogger);
    statusServer = listenStatusApi(app, config.statusPort, config.host, statusLogger);
  }
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down`);
  statusServer?.close();
  await arenaServer.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
