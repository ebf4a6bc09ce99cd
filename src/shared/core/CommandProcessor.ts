import { CommandOutcome, Direction, GameCommand, RejectionReason, SessionTicket } from './types';
import { Arena, isAdjacent, offsetCoord } from './Arena';
import { Roster } from './Roster';
import { StateGuard } from './StateGuard';
import { Broadcaster } from './Broadcaster';
import { parseCommand } from './CommandParser';
import { Logger, createLogger } from '../logger';
import { DAMAGE } from '../constants';
import { Replies } from '../messages';

const REJECTION_REPLIES: Readonly<Record<RejectionReason, string | null>> = {
  'move-usage': Replies.moveUsage,
  'invalid-direction': Replies.invalidDirection,
  'unknown-command': Replies.unknownCommand,
  'out-of-bounds': Replies.outOfBounds,
  obstacle: Replies.obstacle,
  'cell-occupied': Replies.cellOccupied,
  'no-targets': Replies.noTargets,
  'not-in-game': null,
};

/**
 * Text to send back to the issuing session, or null for no reply
 */
export function replyFor(outcome: CommandOutcome): string | null {
  return outcome.status === 'rejected' ? REJECTION_REPLIES[outcome.reason] : null;
}

function rejected(reason: RejectionReason): CommandOutcome {
  return { status: 'rejected', reason };
}

/**
 * CommandProcessor - per-session command resolution
 *
 * Parsing happens outside the guard. Validation, mutation and the
 * broadcast of an accepted command all happen inside one critical section.
 * Rejections never touch state.
 */
export class CommandProcessor {
  private readonly arena: Arena;
  private readonly roster: Roster;
  private readonly guard: StateGuard;
  private readonly broadcaster: Broadcaster;
  private readonly logger: Logger;

  constructor(
    arena: Arena,
    roster: Roster,
    guard: StateGuard,
    broadcaster: Broadcaster,
    logger: Logger = createLogger('CommandProcessor')
  ) {
    this.arena = arena;
    this.roster = roster;
    this.guard = guard;
    this.broadcaster = broadcaster;
    this.logger = logger;
  }

  /**
   * Handle one trimmed line of input from `ticket`'s session
   */
  async execute(ticket: SessionTicket, line: string): Promise<CommandOutcome> {
    const parsed = parseCommand(line);
    if (!parsed.ok) {
      this.logger.debug(`Rejected input from slot ${ticket.slot}`, { line, reason: parsed.error });
      return rejected(parsed.error);
    }

    const command = parsed.command;
    return this.guard.runExclusive(() => this.apply(ticket, command));
  }

  private async apply(ticket: SessionTicket, command: GameCommand): Promise<CommandOutcome> {
    if (!this.roster.isHeldBy(ticket)) {
      return rejected('not-in-game');
    }

    switch (command.type) {
      case 'move':
        return this.move(ticket.slot, command.direction);
      case 'attack':
        return this.attack(ticket.slot);
      case 'quit':
        return this.quit(ticket.slot);
    }
  }

  private async move(index: number, direction: Direction): Promise<CommandOutcome> {
    const slot = this.roster.getSlot(index);
    const target = offsetCoord(slot.position, direction);

    if (!this.arena.isInBounds(target)) return rejected('out-of-bounds');
    if (this.arena.isObstacle(target)) return rejected('obstacle');
    if (!this.roster.isCellFree(target, index)) return rejected('cell-occupied');

    slot.position = target;
    await this.broadcaster.broadcast();
    return { status: 'applied', command: { type: 'move', direction }, terminate: false };
  }

  private async attack(index: number): Promise<CommandOutcome> {
    const attacker = this.roster.getSlot(index);

    // Targets are fixed before any damage so removals cannot change who gets hit
    const targets = this.roster
      .occupiedSlots()
      .filter((slot) => slot.index !== index && isAdjacent(slot.position, attacker.position));

    if (targets.length === 0) return rejected('no-targets');

    for (const target of targets) {
      target.health -= DAMAGE;
      if (target.health <= 0) {
        target.health = 0;
        this.roster.free(target.index);
        this.logger.info(`Player ${target.symbol} was eliminated by player ${attacker.symbol}`);
      }
    }

    await this.broadcaster.broadcast();
    return { status: 'applied', command: { type: 'attack' }, terminate: false };
  }

  private async quit(index: number): Promise<CommandOutcome> {
    const slot = this.roster.getSlot(index);
    this.roster.free(index);
    this.logger.info(`Player ${slot.symbol} quit`);

    await this.broadcaster.broadcast();
    return { status: 'applied', command: { type: 'quit' }, terminate: true };
  }
}
