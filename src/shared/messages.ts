// Server -> Client text, one line each
export const Replies = {
  moveUsage: 'Usage: MOVE <UP|DOWN|LEFT|RIGHT>',
  invalidDirection: 'Invalid direction. Use UP, DOWN, LEFT, or RIGHT.',
  outOfBounds: 'Move blocked: out of bounds.',
  obstacle: 'Move blocked: obstacle in the way.',
  cellOccupied: 'Move blocked: another player is in that cell.',
  noTargets: 'No targets adjacent to attack.',
  unknownCommand: 'Unknown command. Available commands: MOVE, ATTACK, QUIT.',
  serverFull: 'Server full. Try again later.',
  noSlotAvailable: 'Server error: no slot available.',
} as const;

// Snapshot section headers
export const GRID_HEADER = 'Grid:';
export const PLAYERS_HEADER = 'Players:';

export function formatWelcome(symbol: string): string {
  return `Welcome to the game! You are player ${symbol}.`;
}

export function formatPlayerLine(symbol: string, health: number, row: number, col: number): string {
  return `${symbol}: HP=${health} at (${row},${col})`;
}

/**
 * Terminate every line of a message for the wire
 */
export function toWire(lines: string | readonly string[]): string {
  const list = typeof lines === 'string' ? [lines] : lines;
  return list.map((line) => `${line}\n`).join('');
}
