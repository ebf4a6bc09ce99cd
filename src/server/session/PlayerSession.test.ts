import { PlayerSession } from './PlayerSession';
import { Arena, GameEngine, SessionTicket } from '../../shared/core';
import { FakeTransport, cellsRandom, quietLogger } from '../../testing/fakes';

async function* chunks(...parts: Array<string | Buffer>): AsyncGenerator<string | Buffer> {
  for (const part of parts) {
    yield part;
  }
}

async function* failingAfter(part: string): AsyncGenerator<string> {
  yield part;
  throw new Error('ECONNRESET');
}

describe('PlayerSession', () => {
  const arena = new Arena([{ row: 0, col: 4 }]);
  let engine: GameEngine;

  beforeEach(() => {
    engine = new GameEngine({ arena, random: cellsRandom([{ row: 2, col: 2 }, { row: 3, col: 3 }]), logger: quietLogger() });
  });

  async function seat(id: string): Promise<{ transport: FakeTransport; ticket: SessionTicket }> {
    const transport = new FakeTransport(id);
    const result = await engine.join(transport);
    if (result.status !== 'joined') {
      throw new Error(`${id} was not seated`);
    }
    return { transport, ticket: result.ticket };
  }

  it('should run commands in order and reply to rejected ones', async () => {
    const a = await seat('a');
    const session = new PlayerSession(engine, a.ticket, chunks('MOVE UP\nda', 'nce\n', Buffer.from('MOVE\n')), quietLogger());

    await session.run();

    expect(a.transport.sent.slice(2)).toEqual([
      'Grid:\n. . . . X\n. . A . .\n. . . . .\n. . . . .\n. . . . .\nPlayers:\nA: HP=100 at (1,2)\n',
      'Unknown command. Available commands: MOVE, ATTACK, QUIT.\n',
      'Usage: MOVE <UP|DOWN|LEFT|RIGHT>\n',
    ]);
  });

  it('should leave when the stream ends, ignoring a cut-off line', async () => {
    const a = await seat('a');
    const b = await seat('b');
    const session = new PlayerSession(engine, b.ticket, chunks('MOVE LEFT\nMOVE UP'), quietLogger());

    await session.run();

    expect(engine.roster.getSlot(1).occupied).toBe(false);
    expect(b.transport.closed).toBe(true);
    expect(a.transport.last).toBe(
      'Grid:\n. . . . X\n. . . . .\n. . A . .\n. . . . .\n. . . . .\nPlayers:\nA: HP=100 at (2,2)\n'
    );
    // the partial "MOVE UP" never ran: B's last position was (3,2)
    expect(engine.roster.getSlot(1).position).toEqual({ row: 3, col: 2 });
  });

  it('should stop reading after QUIT', async () => {
    const a = await seat('a');
    const session = new PlayerSession(engine, a.ticket, chunks('QUIT\nMOVE UP\n'), quietLogger());

    await session.run();

    expect(engine.roster.countOccupied()).toBe(0);
    expect(engine.roster.getSlot(0).position).toEqual({ row: 2, col: 2 });
    expect(a.transport.sent).toHaveLength(2);
  });

  it('should stop silently once the player has been removed', async () => {
    const a = await seat('a');
    const b = await seat('b');
    await engine.leave(b.ticket);
    const session = new PlayerSession(engine, b.ticket, chunks('MOVE UP\nATTACK\n'), quietLogger());

    await session.run();

    expect(b.transport.sent).toHaveLength(2);
    expect(engine.roster.getSlot(1).occupied).toBe(false);
    expect(engine.roster.getSlot(0).occupied).toBe(true);
    expect(a.transport.sent).toHaveLength(4);
  });

  it('should free the slot when the stream fails', async () => {
    const a = await seat('a');
    const session = new PlayerSession(engine, a.ticket, failingAfter('MOVE DOWN\n'), quietLogger());

    await session.run();

    expect(engine.roster.countOccupied()).toBe(0);
    expect(a.transport.closed).toBe(true);
  });

  it('should stop when a reply cannot be sent', async () => {
    const a = await seat('a');
    a.transport.failSends();
    const session = new PlayerSession(engine, a.ticket, chunks('JUMP\nMOVE UP\n'), quietLogger());

    await session.run();

    expect(engine.roster.countOccupied()).toBe(0);
    expect(engine.roster.getSlot(0).position).toEqual({ row: 2, col: 2 });
  });
});
