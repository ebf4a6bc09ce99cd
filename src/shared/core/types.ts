/**
 * Platform-independent game types for grid-brawl
 *
 * These types are shared between the game core and the TCP server.
 * They carry NO dependency on sockets or any Node-specific API.
 */

// =============================================================================
// Grid Types
// =============================================================================

/**
 * Cell coordinate on the grid, both axes in [0, GRID_SIZE)
 */
export interface Coord {
  row: number;
  col: number;
}

export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

// =============================================================================
// Transport Types
// =============================================================================

/**
 * A connection to one participant
 *
 * Sockets in production, in-memory fakes in tests.
 */
export interface Transport {
  /** Identifier used in logs */
  readonly id: string;

  /**
   * Deliver text to the participant.
   * Rejects when the connection is closed or the write fails.
   */
  send(text: string): Promise<void>;

  /** Release the connection. Safe to call more than once. */
  close(): void;
}

// =============================================================================
// Roster Types
// =============================================================================

/**
 * One of the MAX_PLAYERS fixed-identity player records
 *
 * The symbol belongs to the slot index and survives reuse by later connections.
 * When `occupied` is false, `transport` is null and `health` carries no meaning.
 */
export interface PlayerSlot {
  /** Slot index, 0..MAX_PLAYERS-1 */
  readonly index: number;

  /** Display symbol ('A'..'D') */
  readonly symbol: string;

  /** Current cell, never an obstacle */
  position: Coord;

  /** Hit points, 0..MAX_HP */
  health: number;

  /** Connection of the current occupant */
  transport: Transport | null;

  /** Whether a participant holds this slot */
  occupied: boolean;
}

/**
 * Identifies one connection's claim on a slot
 *
 * A ticket goes stale once its slot is freed, even if the slot is later reoccupied.
 */
export interface SessionTicket {
  slot: number;
  transport: Transport;
}

// =============================================================================
// Command Types
// =============================================================================

export type GameCommand =
  | { type: 'move'; direction: Direction }
  | { type: 'attack' }
  | { type: 'quit' };

/**
 * Malformed or unrecognized input, reported to the sender only
 */
export type ProtocolError = 'move-usage' | 'invalid-direction' | 'unknown-command';

/**
 * Well-formed command that breaks a game rule
 */
export type PolicyRejection = 'out-of-bounds' | 'obstacle' | 'cell-occupied' | 'no-targets';

/**
 * The sender no longer holds its slot; the session should end silently
 */
export type StaleSession = 'not-in-game';

export type RejectionReason = ProtocolError | PolicyRejection | StaleSession;

export type ParseResult =
  | { ok: true; command: GameCommand }
  | { ok: false; error: ProtocolError };

/**
 * Result of applying one command
 *
 * State was mutated (and broadcast) only when status is 'applied'.
 */
export type CommandOutcome =
  | { status: 'rejected'; reason: RejectionReason }
  | { status: 'applied'; command: GameCommand; terminate: boolean };

// =============================================================================
// Lifecycle Types
// =============================================================================

export type JoinResult =
  | { status: 'joined'; ticket: SessionTicket; symbol: string; position: Coord }
  | { status: 'full' }
  | { status: 'unavailable' }
  | { status: 'dropped' };

// =============================================================================
// Snapshot Types
// =============================================================================

export interface PlayerView {
  symbol: string;
  health: number;
  row: number;
  col: number;
}

/**
 * Consistent copy of the game state taken under the state guard
 */
export interface GameSnapshot {
  gridSize: number;
  maxPlayers: number;
  occupied: number;
  obstacles: Coord[];
  players: PlayerView[];
  /** One string of cell markers per grid row */
  rows: string[];
}
