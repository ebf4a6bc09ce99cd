import { GameEngine, SessionTicket, replyFor } from '../../shared/core';
import { Logger, createLogger } from '../../shared/logger';
import { toWire } from '../../shared/messages';
import { LineFramer } from '../transport/LineFramer';

export type SessionInput = AsyncIterable<string | Buffer>;

/**
 * Read loop for one connected player
 *
 * Commands are handled strictly in arrival order: the next line is not
 * executed until the previous one (and its broadcast) has finished.
 * Whatever ends the loop, the leave path runs afterwards.
 */
export class PlayerSession {
  private readonly engine: GameEngine;
  private readonly ticket: SessionTicket;
  private readonly input: SessionInput;
  private readonly logger: Logger;
  private readonly framer = new LineFramer();

  constructor(engine: GameEngine, ticket: SessionTicket, input: SessionInput, logger: Logger = createLogger('PlayerSession')) {
    this.engine = engine;
    this.ticket = ticket;
    this.input = input;
    this.logger = logger;
  }

  async run(): Promise<void> {
    try {
      await this.readLoop();
    } catch (error) {
      this.logger.debug(`Read loop for ${this.ticket.transport.id} ended with an error`, error);
    } finally {
      await this.engine.leave(this.ticket);
    }
  }

  private async readLoop(): Promise<void> {
    for await (const chunk of this.input) {
      const text = Buffer.isBuffer(chunk) ? chunk.toString('utf8') : chunk;
      for (const line of this.framer.push(text)) {
        const keepGoing = await this.handleLine(line);
        if (!keepGoing) return;
      }
    }
  }

  /**
   * @returns false when the session should stop reading
   */
  private async handleLine(line: string): Promise<boolean> {
    const outcome = await this.engine.execute(this.ticket, line);

    if (outcome.status === 'applied') {
      return !outcome.terminate;
    }

    const reply = replyFor(outcome);
    if (reply === null) {
      return false;
    }

    try {
      await this.ticket.transport.send(toWire(reply));
      return true;
    } catch (error) {
      this.logger.warn(`Reply to ${this.ticket.transport.id} failed`, error);
      return false;
    }
  }
}
