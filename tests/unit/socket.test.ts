import jwt from 'jsonwebtoken';
import {
  ALL_MARKETS_ROOM,
  authenticateSocket,
  HandshakeSocket,
  MarketBroadcaster,
  marketRoom,
  marketRoomHandlers,
  RoomEmitter,
} from '../../src/socket';

interface Emitted {
  rooms: string | string[];
  event: string;
  payload: unknown;
}

function recordingEmitter(log: Emitted[]): RoomEmitter {
  return {
    to(rooms) {
      return {
        emit(event, payload) {
          log.push({ rooms, event, payload });
          return true;
        },
      };
    },
  };
}

const market = {
  id: 3,
  start_price: 50000n,
  end_price: 0n,
  total_up_stake: 0n,
  total_down_stake: 0n,
  start_block: 10n,
  end_block: 20n,
  resolved: false,
};

describe('MarketBroadcaster', () => {
  it('sends market events to the lobby and the market room', () => {
    const log: Emitted[] = [];
    new MarketBroadcaster(recordingEmitter(log)).marketCreated(market);

    expect(log).toEqual([
      {
        rooms: [ALL_MARKETS_ROOM, 'market:3'],
        event: 'market_created',
        payload: {
          id: 3,
          start_price: '50000',
          end_price: '0',
          total_up_stake: '0',
          total_down_stake: '0',
          start_block: '10',
          end_block: '20',
          resolved: false,
        },
      },
    ]);
  });

  it('serializes claim receipts', () => {
    const log: Emitted[] = [];
    new MarketBroadcaster(recordingEmitter(log)).winningsClaimed({
      market_id: 3,
      participant: 'alice',
      winnings: 10n,
      fee: 1n,
      payout: 9n,
    });

    expect(log[0]).toEqual({
      rooms: [ALL_MARKETS_ROOM, marketRoom(3)],
      event: 'winnings_claimed',
      payload: { market_id: 3, participant: 'alice', winnings: '10', fee: '1', payout: '9' },
    });
  });

  it('sends protocol updates to the lobby only', () => {
    const log: Emitted[] = [];
    new MarketBroadcaster(recordingEmitter(log)).protocolUpdated({
      owner_id: 'o',
      oracle_id: 'r',
      minimum_stake: 5n,
      fee_percent: 2,
      next_market_id: 4,
    });

    expect(log).toEqual([
      {
        rooms: ALL_MARKETS_ROOM,
        event: 'protocol_updated',
        payload: { owner_id: 'o', oracle_id: 'r', minimum_stake: '5', fee_percent: 2, next_market_id: 4 },
      },
    ]);
  });

  it('is silent without a socket server', () => {
    expect(() => new MarketBroadcaster(null).marketResolved(market)).not.toThrow();
  });
});

describe('authenticateSocket', () => {
  const SECRET = 'test-secret';
  const authenticate = authenticateSocket(SECRET);

  function handshake(auth: Record<string, unknown>, authorization?: string): HandshakeSocket {
    return { handshake: { auth, headers: { authorization } } };
  }

  function run(socket: HandshakeSocket): Error | undefined {
    let result: Error | undefined;
    authenticate(socket, (err) => {
      result = err;
    });
    return result;
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('accepts a token from the handshake auth payload', () => {
    const socket = handshake({ token: jwt.sign({}, SECRET, { subject: 'alice' }) });

    expect(run(socket)).toBeUndefined();
    expect(socket.userId).toBe('alice');
  });

  it('falls back to the Authorization header', () => {
    const socket = handshake({}, `Bearer ${jwt.sign({}, SECRET, { subject: 'bob' })}`);

    expect(run(socket)).toBeUndefined();
    expect(socket.userId).toBe('bob');
  });

  it('rejects a missing token', () => {
    const socket = handshake({});

    expect(run(socket)?.message).toBe('Authentication error');
    expect(socket.userId).toBeUndefined();
  });

  it('rejects a token signed with another secret', () => {
    const socket = handshake({ token: jwt.sign({}, 'other-secret', { subject: 'mallory' }) });

    expect(run(socket)?.message).toBe('Authentication error');
    expect(socket.userId).toBeUndefined();
  });
});

describe('marketRoomHandlers', () => {
  function member() {
    const calls: string[] = [];
    const rooms = marketRoomHandlers({
      join: (room) => calls.push(`join ${room}`),
      leave: (room) => calls.push(`leave ${room}`),
    });
    return { calls, rooms };
  }

  it('joins and leaves market rooms by id', () => {
    const { calls, rooms } = member();

    rooms.join_market(4);
    rooms.leave_market(4);

    expect(calls).toEqual(['join market:4', 'leave market:4']);
  });

  it('ignores ids that are not non-negative safe integers', () => {
    const { calls, rooms } = member();

    rooms.join_market('4');
    rooms.join_market(-1);
    rooms.join_market(1.5);
    rooms.leave_market(Number.MAX_SAFE_INTEGER + 1);
    rooms.leave_market(null);

    expect(calls).toEqual([]);
  });
});
