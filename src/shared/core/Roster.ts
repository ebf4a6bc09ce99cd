import { Coord, PlayerSlot, SessionTicket, Transport } from './types';
import { Arena, sameCoord } from './Arena';
import { RandomSource, defaultRandom, randomCoord } from './random';
import { createInvalidSlotError, createNoFreeCellError } from '../errors';
import { MAX_HP, MAX_PLACEMENT_ATTEMPTS, MAX_PLAYERS, PLAYER_SYMBOLS } from '../constants';

/**
 * Roster - the table of player slots
 *
 * Holds no lock of its own: every method must be called while the
 * StateGuard is held (GameEngine and its collaborators take care of that).
 *
 * Invariants kept by the methods below:
 * - occupied slots never share a position
 * - an occupied slot never sits on an obstacle or outside the grid
 * - `countOccupied()` equals the number of slots flagged occupied
 */
export class Roster {
  private readonly arena: Arena;
  private readonly random: RandomSource;
  private readonly slots: PlayerSlot[];
  private occupiedCount = 0;

  constructor(arena: Arena, random: RandomSource = defaultRandom) {
    this.arena = arena;
    this.random = random;
    this.slots = PLAYER_SYMBOLS.slice(0, MAX_PLAYERS).map((symbol, index) => ({
      index,
      symbol,
      position: { row: 0, col: 0 },
      health: 0,
      transport: null,
      occupied: false,
    }));
  }

  get capacity(): number {
    return this.slots.length;
  }

  getSlot(index: number): PlayerSlot {
    const slot = this.slots[index];
    if (!slot) {
      throw createInvalidSlotError(index);
    }
    return slot;
  }

  /**
   * First free slot by ascending index, or null when all are taken
   */
  findFreeSlot(): number | null {
    const slot = this.slots.find((candidate) => !candidate.occupied);
    return slot ? slot.index : null;
  }

  /**
   * True if no occupied slot other than `excludingSlot` stands on `coord`
   */
  isCellFree(coord: Coord, excludingSlot: number | null = null): boolean {
    return !this.slots.some(
      (slot) => slot.occupied && slot.index !== excludingSlot && sameCoord(slot.position, coord)
    );
  }

  /**
   * Occupied slot standing on `coord`, if any
   */
  slotAt(coord: Coord): PlayerSlot | undefined {
    return this.slots.find((slot) => slot.occupied && sameCoord(slot.position, coord));
  }

  /**
   * Give a slot to a new connection with full health at a random legal cell
   */
  occupy(index: number, transport: Transport): PlayerSlot {
    const slot = this.getSlot(index);
    const wasOccupied = slot.occupied;

    slot.position = this.pickSpawn(index);
    slot.health = MAX_HP;
    slot.transport = transport;
    slot.occupied = true;

    if (!wasOccupied) {
      this.occupiedCount++;
    }
    return slot;
  }

  /**
   * Release a slot and close its transport
   *
   * Freeing a slot that is already free changes nothing.
   */
  free(index: number): void {
    const slot = this.getSlot(index);

    slot.transport?.close();
    slot.transport = null;

    if (slot.occupied) {
      slot.occupied = false;
      this.occupiedCount--;
    }
  }

  /**
   * Whether `ticket` still owns its slot
   */
  isHeldBy(ticket: SessionTicket): boolean {
    const slot = this.slots[ticket.slot];
    return slot !== undefined && slot.occupied && slot.transport === ticket.transport;
  }

  countOccupied(): number {
    return this.occupiedCount;
  }

  /**
   * Occupied slots in index order
   */
  occupiedSlots(): PlayerSlot[] {
    return this.slots.filter((slot) => slot.occupied);
  }

  private isSpawnable(coord: Coord, index: number): boolean {
    return !this.arena.isObstacle(coord) && this.isCellFree(coord, index);
  }

  /**
   * Rejection sampling over the whole grid, then a uniform pick among the
   * remaining legal cells if sampling keeps missing.
   */
  private pickSpawn(index: number): Coord {
    for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS; attempt++) {
      const coord = randomCoord(this.random, this.arena.size);
      if (this.isSpawnable(coord, index)) {
        return coord;
      }
    }

    const candidates = this.arena.cells().filter((coord) => this.isSpawnable(coord, index));
    const pick = candidates[Math.floor(this.random() * candidates.length)];
    if (!pick) {
      throw createNoFreeCellError();
    }
    return pick;
  }
}
