import { Direction, ParseResult } from './types';

const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

function isDirection(token: string): token is Direction {
  return (DIRECTIONS as readonly string[]).includes(token);
}

/**
 * Parse one line of client input
 *
 * Keywords and the MOVE direction are case-insensitive. Tokens after the
 * direction are ignored; ATTACK and QUIT take no argument at all.
 */
export function parseCommand(line: string): ParseResult {
  const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
  const keyword: string | undefined = tokens[0];
  const argument: string | undefined = tokens[1];
  if (keyword === undefined) {
    return { ok: false, error: 'unknown-command' };
  }

  switch (keyword.toUpperCase()) {
    case 'MOVE': {
      if (argument === undefined) {
        return { ok: false, error: 'move-usage' };
      }
      const direction = argument.toUpperCase();
      if (!isDirection(direction)) {
        return { ok: false, error: 'invalid-direction' };
      }
      return { ok: true, command: { type: 'move', direction } };
    }
    case 'ATTACK':
      return tokens.length === 1 ? { ok: true, command: { type: 'attack' } } : { ok: false, error: 'unknown-command' };
    case 'QUIT':
      return tokens.length === 1 ? { ok: true, command: { type: 'quit' } } : { ok: false, error: 'unknown-command' };
    default:
      return { ok: false, error: 'unknown-command' };
  }
}
