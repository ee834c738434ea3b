import { Server as SocketIOServer, Socket } from 'socket.io';
import { Market } from './models/market.types';
import { ClaimReceipt, Prediction } from './models/prediction.types';
import { ProtocolConfig } from './models/protocol.types';
import { bearerToken, verifyAccessToken } from './middleware/auth';
import { serialize } from './utils/uint';

export const ALL_MARKETS_ROOM = 'markets';

export function marketRoom(marketId: number): string {
  return `market:${marketId}`;
}

/** The slice of a socket.io server the broadcaster needs. */
export interface RoomEmitter {
  to(room: string | string[]): { emit(event: string, payload: unknown): boolean };
}

export class MarketBroadcaster {
  constructor(private readonly io: RoomEmitter | null) {}

  marketCreated(market: Market): void {
    this.emit(market.id, 'market_created', serialize(market));
  }

  predictionSubmitted(prediction: Prediction, market: Market): void {
    this.emit(prediction.market_id, 'prediction_submitted', {
      prediction: serialize(prediction),
      market: serialize(market),
    });
  }

  marketResolved(market: Market): void {
    this.emit(market.id, 'market_resolved', serialize(market));
  }

  winningsClaimed(receipt: ClaimReceipt): void {
    this.emit(receipt.market_id, 'winnings_claimed', serialize(receipt));
  }

  protocolUpdated(protocol: ProtocolConfig): void {
    this.io?.to(ALL_MARKETS_ROOM).emit('protocol_updated', serialize(protocol));
  }

  private emit(marketId: number, event: string, payload: unknown): void {
    this.io?.to([ALL_MARKETS_ROOM, marketRoom(marketId)]).emit(event, payload);
  }
}

interface MarketSocket extends Socket {
  userId?: string;
}

/** Handshake fields the authentication middleware reads. */
export interface HandshakeSocket {
  handshake: {
    auth: Record<string, unknown>;
    headers: { authorization?: string };
  };
  userId?: string;
}

/** Room membership calls of a connected socket. */
export interface RoomMember {
  join(room: string): unknown;
  leave(room: string): unknown;
}

function parseMarketId(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value : null;
}

/** Accepts a token from `auth.token` or a bearer Authorization header. */
export function authenticateSocket(jwtSecret: string) {
  return (socket: HandshakeSocket, next: (err?: Error) => void): void => {
    const raw = socket.handshake.auth.token;
    const token = typeof raw === 'string' ? raw : bearerToken(socket.handshake.headers.authorization);

    if (!token) {
      return next(new Error('Authentication error'));
    }

    try {
      socket.userId = verifyAccessToken(token, jwtSecret);
    } catch (error) {
      console.log('[SOCKET] Handshake rejected:', error instanceof Error ? error.message : error);
      return next(new Error('Authentication error'));
    }
    next();
  };
}

export function marketRoomHandlers(socket: RoomMember) {
  return {
    join_market(marketId: unknown): void {
      const id = parseMarketId(marketId);
      if (id !== null) socket.join(marketRoom(id));
    },
    leave_market(marketId: unknown): void {
      const id = parseMarketId(marketId);
      if (id !== null) socket.leave(marketRoom(id));
    },
  };
}

export function setupSocketIO(io: SocketIOServer, jwtSecret: string) {
  io.use(authenticateSocket(jwtSecret));

  io.on('connection', (socket: MarketSocket) => {
    const userId = socket.userId ?? 'unknown';
    console.log(`[SOCKET] Connected: ${userId}`);

    socket.join(ALL_MARKETS_ROOM);

    const rooms = marketRoomHandlers(socket);
    socket.on('join_market', rooms.join_market);
    socket.on('leave_market', rooms.leave_market);

    socket.on('disconnect', () => {
      console.log(`[SOCKET] Disconnected: ${userId}`);
    });
  });
}
