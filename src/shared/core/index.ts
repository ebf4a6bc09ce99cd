/**
 * Shared Game Core Module
 *
 * Transport-independent game logic used by the TCP server and the status API.
 */

// Types
export * from './types';
export { type RandomSource, defaultRandom, randomInt, randomCoord } from './random';

// Components
export { Arena, DIRECTION_OFFSETS, coordKey, sameCoord, offsetCoord, isAdjacent } from './Arena';
export { Roster } from './Roster';
export { StateGuard } from './StateGuard';
export { parseCommand } from './CommandParser';
export { CommandProcessor, replyFor } from './CommandProcessor';
export { Broadcaster, formatSnapshot, type BroadcastReport } from './Broadcaster';
export { SessionLifecycle } from './SessionLifecycle';

// Main Engine
export { GameEngine, type GameEngineOptions } from './GameEngine';
