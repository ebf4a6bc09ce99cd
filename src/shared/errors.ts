export enum GameErrorCode {
  // Roster errors
  SERVER_FULL = 'SERVER_FULL',
  NO_SLOT_AVAILABLE = 'NO_SLOT_AVAILABLE',
  NO_FREE_CELL = 'NO_FREE_CELL',
  INVALID_SLOT = 'INVALID_SLOT',

  // Transport errors
  TRANSPORT_CLOSED = 'TRANSPORT_CLOSED',
  SEND_FAILED = 'SEND_FAILED',

  // Concurrency errors
  GUARD_NOT_HELD = 'GUARD_NOT_HELD',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Internal errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class GameError extends Error {
  public readonly code: GameErrorCode;
  public readonly statusCode: number;
  public readonly metadata?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    message: string,
    code: GameErrorCode,
    statusCode: number = 400,
    metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.statusCode = statusCode;
    this.metadata = metadata;
    this.timestamp = Date.now();
    Object.setPrototypeOf(this, GameError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      metadata: this.metadata,
      timestamp: this.timestamp,
    };
  }
}

export function isGameError(error: unknown, code?: GameErrorCode): error is GameError {
  return error instanceof GameError && (code === undefined || error.code === code);
}

// Factory functions for common errors
export function createServerFullError(maxPlayers: number): GameError {
  return new GameError('Server is full', GameErrorCode.SERVER_FULL, 503, { maxPlayers });
}

export function createNoSlotAvailableError(occupied: number): GameError {
  return new GameError(
    'Occupancy count reports a free slot but none was found',
    GameErrorCode.NO_SLOT_AVAILABLE,
    500,
    { occupied }
  );
}

export function createNoFreeCellError(): GameError {
  return new GameError('No free cell left for placement', GameErrorCode.NO_FREE_CELL, 500);
}

export function createInvalidSlotError(slot: number): GameError {
  return new GameError(`Invalid slot: ${slot}`, GameErrorCode.INVALID_SLOT, 400, { slot });
}

export function createTransportClosedError(transportId: string): GameError {
  return new GameError('Transport is closed', GameErrorCode.TRANSPORT_CLOSED, 410, { transportId });
}

export function createSendFailedError(transportId: string, cause: Error): GameError {
  return new GameError(`Send failed: ${cause.message}`, GameErrorCode.SEND_FAILED, 502, { transportId });
}

export function createGuardNotHeldError(operation: string): GameError {
  return new GameError(
    `${operation} requires the state guard`,
    GameErrorCode.GUARD_NOT_HELD,
    500,
    { operation }
  );
}

export function createInvalidConfigError(setting: string, value: string): GameError {
  return new GameError(`Invalid ${setting}: ${value}`, GameErrorCode.INVALID_CONFIG, 400, { setting, value });
}
