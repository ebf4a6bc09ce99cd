import { GameSnapshot } from './types';
import { Arena } from './Arena';
import { Roster } from './Roster';
import { StateGuard } from './StateGuard';
import { Logger, createLogger } from '../logger';
import { createGuardNotHeldError } from '../errors';
import { EMPTY_MARKER, OBSTACLE_MARKER } from '../constants';
import { GRID_HEADER, PLAYERS_HEADER, formatPlayerLine, toWire } from '../messages';

export interface BroadcastReport {
  /** Symbols that received the snapshot */
  delivered: string[];
  /** Symbols freed because delivery failed */
  dropped: string[];
}

/**
 * Render a snapshot as the wire block sent to every player
 */
export function formatSnapshot(snapshot: GameSnapshot): string {
  return toWire([
    GRID_HEADER,
    ...snapshot.rows,
    PLAYERS_HEADER,
    ...snapshot.players.map((player) => formatPlayerLine(player.symbol, player.health, player.row, player.col)),
  ]);
}

/**
 * Broadcaster renders the full game state and sends it to every occupied slot.
 *
 * Must run while the StateGuard is held by the operation that changed the
 * state, so the rendering and any slot removed on a failed send belong to
 * the same critical section.
 */
export class Broadcaster {
  private readonly arena: Arena;
  private readonly roster: Roster;
  private readonly guard: StateGuard;
  private readonly logger: Logger;

  constructor(arena: Arena, roster: Roster, guard: StateGuard, logger: Logger = createLogger('Broadcaster')) {
    this.arena = arena;
    this.roster = roster;
    this.guard = guard;
    this.logger = logger;
  }

  /**
   * Copy the current state: grid markers row-major, then occupied slots by index
   */
  takeSnapshot(): GameSnapshot {
    const rows: string[] = [];
    for (let row = 0; row < this.arena.size; row++) {
      const markers: string[] = [];
      for (let col = 0; col < this.arena.size; col++) {
        const coord = { row, col };
        if (this.arena.isObstacle(coord)) {
          markers.push(OBSTACLE_MARKER);
        } else {
          markers.push(this.roster.slotAt(coord)?.symbol ?? EMPTY_MARKER);
        }
      }
      rows.push(markers.join(' '));
    }

    return {
      gridSize: this.arena.size,
      maxPlayers: this.roster.capacity,
      occupied: this.roster.countOccupied(),
      obstacles: this.arena.listObstacles(),
      players: this.roster.occupiedSlots().map((slot) => ({
        symbol: slot.symbol,
        health: slot.health,
        row: slot.position.row,
        col: slot.position.col,
      })),
      rows,
    };
  }

  renderSnapshot(): string {
    return formatSnapshot(this.takeSnapshot());
  }

  /**
   * Send `text` to every occupied slot, freeing each slot whose send fails
   *
   * A slot freed earlier in the pass is skipped. Its removal is not
   * broadcast separately.
   */
  async deliver(text: string): Promise<BroadcastReport> {
    if (!this.guard.isHeld) {
      throw createGuardNotHeldError('deliver');
    }

    const report: BroadcastReport = { delivered: [], dropped: [] };

    for (const slot of this.roster.occupiedSlots()) {
      const transport = slot.transport;
      if (!slot.occupied || !transport) continue;

      try {
        await transport.send(text);
        report.delivered.push(slot.symbol);
      } catch (error) {
        this.logger.warn(`Broadcast to player ${slot.symbol} failed, removing player`, error);
        this.roster.free(slot.index);
        report.dropped.push(slot.symbol);
      }
    }

    return report;
  }

  async broadcast(): Promise<BroadcastReport> {
    return this.deliver(this.renderSnapshot());
  }
}
