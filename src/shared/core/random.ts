import { Coord } from './types';

/**
 * Source of uniform numbers in [0, 1), Math.random by default
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Uniform integer in [min, max]
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomCoord(random: RandomSource, gridSize: number): Coord {
  const row = randomInt(random, 0, gridSize - 1);
  const col = randomInt(random, 0, gridSize - 1);
  return { row, col };
}
