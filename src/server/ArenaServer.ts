import { AddressInfo, Server, Socket, createServer } from 'net';
import { GameEngine } from '../shared/core';
import { Logger, createLogger } from '../shared/logger';
import { PlayerSession } from './session/PlayerSession';
import { SocketTransport } from './transport/SocketTransport';

/**
 * Accepts TCP connections and runs one PlayerSession per seated player
 */
export class ArenaServer {
  private readonly engine: GameEngine;
  private readonly logger: Logger;
  private readonly server: Server;
  private readonly transports: Set<SocketTransport> = new Set();
  private readonly sessions: Set<Promise<void>> = new Set();

  constructor(engine: GameEngine, logger: Logger = createLogger('ArenaServer')) {
    this.engine = engine;
    this.logger = logger;
    this.server = createServer((socket) => this.handleConnection(socket));
    this.server.on('error', (error) => this.logger.error('Server error', error));
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not bound to a TCP port'));
          return;
        }
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting, disconnect everyone and wait for their sessions to finish
   */
  async close(): Promise<void> {
    const closed = new Promise<void>((resolve) => this.server.close(() => resolve()));
    this.transports.forEach((transport) => transport.close());
    await Promise.allSettled(Array.from(this.sessions));
    await closed;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  private handleConnection(socket: Socket): void {
    socket.setEncoding('utf8');
    socket.setNoDelay(true);
    socket.on('error', (error) => this.logger.warn('Socket error', error));

    const transport = new SocketTransport(socket);
    this.transports.add(transport);
    socket.once('close', () => this.transports.delete(transport));

    const task = this.admit(socket, transport)
      .catch((error: unknown) => {
        this.logger.error(`Session for ${transport.id} failed`, error);
        transport.close();
      })
      .finally(() => {
        this.sessions.delete(task);
      });
    this.sessions.add(task);
  }

  private async admit(socket: Socket, transport: SocketTransport): Promise<void> {
    const result = await this.engine.join(transport);
    if (result.status !== 'joined') {
      this.logger.debug(`Connection ${transport.id} not seated`, { status: result.status });
      return;
    }

    const session = new PlayerSession(this.engine, result.ticket, socket, this.logger.child(result.symbol));
    await session.run();
    this.logger.debug(`Session for player ${result.symbol} finished`);
  }
}
