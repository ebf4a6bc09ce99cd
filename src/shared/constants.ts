/**
 * Shared constants for grid-brawl
 * Used by the game core and the server
 */

// Grid
export const GRID_SIZE = 5;
export const MIN_OBSTACLES = 3;
export const MAX_OBSTACLES = 5;

// Roster
export const MAX_PLAYERS = 4;
export const PLAYER_SYMBOLS = ['A', 'B', 'C', 'D'] as const;

// Combat
export const MAX_HP = 100;
export const DAMAGE = 20;

// Placement
export const MAX_PLACEMENT_ATTEMPTS = 1000; // Rejection sampling retries before enumerating cells

// Snapshot markers
export const OBSTACLE_MARKER = 'X';
export const EMPTY_MARKER = '.';

// Transport
export const MAX_LINE_LENGTH = 1024;
