import { Replies, formatPlayerLine, formatWelcome, toWire } from './messages';

describe('messages', () => {
  it('should format the welcome line', () => {
    expect(formatWelcome('C')).toBe('Welcome to the game! You are player C.');
  });

  it('should format a player status line', () => {
    expect(formatPlayerLine('B', 60, 3, 0)).toBe('B: HP=60 at (3,0)');
  });

  it('should terminate each line with a newline', () => {
    expect(toWire(Replies.serverFull)).toBe('Server full. Try again later.\n');
    expect(toWire(['Grid:', '. X'])).toBe('Grid:\n. X\n');
    expect(toWire([])).toBe('');
  });
});
