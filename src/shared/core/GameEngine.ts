/**
 * GameEngine - the shared game context
 *
 * One GameEngine exists per server process. It owns the Arena, the Roster
 * and the StateGuard that protects them as a unit, and hands every session
 * the same CommandProcessor and SessionLifecycle. Nothing here is global:
 * tests build as many independent engines as they need.
 *
 * Usage:
 * 1. Create an instance (random arena by default)
 * 2. join() each accepted transport
 * 3. execute() each command line a session receives
 * 4. leave() when the session's read loop ends
 */

import { CommandOutcome, GameSnapshot, JoinResult, SessionTicket, Transport } from './types';
import { Arena } from './Arena';
import { Roster } from './Roster';
import { StateGuard } from './StateGuard';
import { Broadcaster } from './Broadcaster';
import { CommandProcessor } from './CommandProcessor';
import { SessionLifecycle } from './SessionLifecycle';
import { RandomSource, defaultRandom } from './random';
import { Logger, createLogger } from '../logger';

export interface GameEngineOptions {
  /** Fixed layout; generated from `random` when omitted */
  arena?: Arena;

  /** Drives obstacle and spawn placement */
  random?: RandomSource;

  logger?: Logger;
}

export class GameEngine {
  readonly arena: Arena;
  readonly roster: Roster;
  readonly guard: StateGuard;
  readonly broadcaster: Broadcaster;
  readonly processor: CommandProcessor;
  readonly lifecycle: SessionLifecycle;

  constructor(options: GameEngineOptions = {}) {
    const random = options.random ?? defaultRandom;
    const logger = options.logger ?? createLogger('GameEngine');

    this.arena = options.arena ?? Arena.generate(random);
    this.roster = new Roster(this.arena, random);
    this.guard = new StateGuard();
    this.broadcaster = new Broadcaster(this.arena, this.roster, this.guard, logger.child('Broadcaster'));
    this.processor = new CommandProcessor(this.arena, this.roster, this.guard, this.broadcaster, logger.child('Commands'));
    this.lifecycle = new SessionLifecycle(this.roster, this.guard, this.broadcaster, logger.child('Sessions'));
  }

  join(transport: Transport): Promise<JoinResult> {
    return this.lifecycle.join(transport);
  }

  execute(ticket: SessionTicket, line: string): Promise<CommandOutcome> {
    return this.processor.execute(ticket, line);
  }

  leave(ticket: SessionTicket): Promise<boolean> {
    return this.lifecycle.leave(ticket);
  }

  /**
   * Consistent copy of the state, read under the guard
   */
  snapshot(): Promise<GameSnapshot> {
    return this.guard.runExclusive(() => this.broadcaster.takeSnapshot());
  }
}
