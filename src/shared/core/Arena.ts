import { Coord, Direction } from './types';
import { RandomSource, defaultRandom, randomCoord, randomInt } from './random';
import { GRID_SIZE, MIN_OBSTACLES, MAX_OBSTACLES } from '../constants';

/**
 * Row/column offset for each move direction
 */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, Coord>> = {
  UP: { row: -1, col: 0 },
  DOWN: { row: 1, col: 0 },
  LEFT: { row: 0, col: -1 },
  RIGHT: { row: 0, col: 1 },
};

export function coordKey(coord: Coord): string {
  return `${coord.row},${coord.col}`;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

export function offsetCoord(coord: Coord, direction: Direction): Coord {
  const offset = DIRECTION_OFFSETS[direction];
  return { row: coord.row + offset.row, col: coord.col + offset.col };
}

/**
 * Axis-aligned neighbours only: one axis differs by exactly 1, the other is equal
 */
export function isAdjacent(a: Coord, b: Coord): boolean {
  const dRow = Math.abs(a.row - b.row);
  const dCol = Math.abs(a.col - b.col);
  return dRow + dCol === 1;
}

/**
 * Arena - the grid and its obstacles
 *
 * The layout is fixed at construction and never changes afterwards,
 * so lookups need no locking.
 */
export class Arena {
  readonly size: number;
  private readonly obstacles: ReadonlySet<string>;

  constructor(obstacles: readonly Coord[], size: number = GRID_SIZE) {
    this.size = size;
    const keys = new Set<string>();
    for (const coord of obstacles) {
      if (!this.isInBounds(coord)) {
        throw new RangeError(`Obstacle outside the grid: (${coord.row},${coord.col})`);
      }
      keys.add(coordKey(coord));
    }
    this.obstacles = keys;
  }

  /**
   * Build an arena with MIN_OBSTACLES..MAX_OBSTACLES obstacles at distinct random cells
   *
   * Cells that are already obstacles are re-rolled.
   */
  static generate(random: RandomSource = defaultRandom, size: number = GRID_SIZE): Arena {
    const count = randomInt(random, MIN_OBSTACLES, MAX_OBSTACLES);
    const chosen = new Map<string, Coord>();

    while (chosen.size < count) {
      const coord = randomCoord(random, size);
      const key = coordKey(coord);
      if (chosen.has(key)) continue;
      chosen.set(key, coord);
    }

    return new Arena(Array.from(chosen.values()), size);
  }

  isInBounds(coord: Coord): boolean {
    return coord.row >= 0 && coord.row < this.size && coord.col >= 0 && coord.col < this.size;
  }

  isObstacle(coord: Coord): boolean {
    return this.obstacles.has(coordKey(coord));
  }

  get obstacleCount(): number {
    return this.obstacles.size;
  }

  /**
   * Obstacle cells in row-major order
   */
  listObstacles(): Coord[] {
    return this.cells().filter((coord) => this.isObstacle(coord));
  }

  /**
   * Every cell in row-major order
   */
  cells(): Coord[] {
    const result: Coord[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        result.push({ row, col });
      }
    }
    return result;
  }
}
