import { JoinResult, SessionTicket, Transport } from './types';
import { Roster } from './Roster';
import { StateGuard } from './StateGuard';
import { Broadcaster } from './Broadcaster';
import { Logger, createLogger } from '../logger';
import { createNoSlotAvailableError, createServerFullError } from '../errors';
import { Replies, formatWelcome, toWire } from '../messages';

/**
 * SessionLifecycle - join and leave transitions
 */
export class SessionLifecycle {
  private readonly roster: Roster;
  private readonly guard: StateGuard;
  private readonly broadcaster: Broadcaster;
  private readonly logger: Logger;

  constructor(roster: Roster, guard: StateGuard, broadcaster: Broadcaster, logger: Logger = createLogger('SessionLifecycle')) {
    this.roster = roster;
    this.guard = guard;
    this.broadcaster = broadcaster;
    this.logger = logger;
  }

  /**
   * Seat a newly accepted connection
   *
   * The new roster is broadcast under the guard; the welcome line goes to the
   * new player alone once the guard is released. Rejected connections get a
   * one-line explanation and are closed.
   */
  async join(transport: Transport): Promise<JoinResult> {
    const result = await this.seatExclusive(transport);

    switch (result.status) {
      case 'full':
        await this.refuse(transport, Replies.serverFull);
        return result;
      case 'unavailable':
        await this.refuse(transport, Replies.noSlotAvailable);
        return result;
      case 'dropped':
        return result;
      case 'joined':
        try {
          await transport.send(toWire(formatWelcome(result.symbol)));
          return result;
        } catch (error) {
          this.logger.warn(`Welcome to player ${result.symbol} failed`, error);
          await this.leave(result.ticket);
          return { status: 'dropped' };
        }
    }
  }

  /**
   * Remove a session's player, if it still holds its slot, and close its transport
   *
   * Safe to call after the slot was already freed by QUIT, combat or a failed
   * broadcast: the state is left alone in that case.
   *
   * @returns true if this call freed the slot
   */
  async leave(ticket: SessionTicket): Promise<boolean> {
    try {
      return await this.guard.runExclusive(async () => {
        if (!this.roster.isHeldBy(ticket)) return false;

        const slot = this.roster.getSlot(ticket.slot);
        this.roster.free(ticket.slot);
        this.logger.info(`Player ${slot.symbol} disconnected`);

        await this.broadcaster.broadcast();
        return true;
      });
    } finally {
      ticket.transport.close();
    }
  }

  private async seatExclusive(transport: Transport): Promise<JoinResult> {
    try {
      return await this.guard.runExclusive(() => this.seat(transport));
    } catch (error) {
      this.logger.error(`Join failed for ${transport.id}`, error);
      return { status: 'unavailable' };
    }
  }

  private async seat(transport: Transport): Promise<JoinResult> {
    const occupied = this.roster.countOccupied();
    if (occupied >= this.roster.capacity) {
      this.logger.info(`Refused ${transport.id}`, createServerFullError(this.roster.capacity).toJSON());
      return { status: 'full' };
    }

    const index = this.roster.findFreeSlot();
    if (index === null) {
      this.logger.error(`Refused ${transport.id}`, createNoSlotAvailableError(occupied));
      return { status: 'unavailable' };
    }

    const slot = this.roster.occupy(index, transport);
    this.logger.info(`New player ${slot.symbol} joined at position (${slot.position.row},${slot.position.col}).`);

    const ticket: SessionTicket = { slot: index, transport };
    const report = await this.broadcaster.broadcast();
    if (report.dropped.includes(slot.symbol)) {
      return { status: 'dropped' };
    }

    return { status: 'joined', ticket, symbol: slot.symbol, position: { ...slot.position } };
  }

  private async refuse(transport: Transport, reply: string): Promise<void> {
    try {
      await transport.send(toWire(reply));
    } catch (error) {
      this.logger.debug(`Could not notify refused ${transport.id}`, error);
    } finally {
      transport.close();
    }
  }
}
