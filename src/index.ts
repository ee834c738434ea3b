import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { EnvConfig, loadConfig } from './config/env';
import { createSupabaseAdmin } from './config/supabase';
import { ProtocolConfig } from './models/protocol.types';
import { SettlementEngine } from './services/engine.service';
import { ClockHeightSource } from './services/height.service';
import { MarketBroadcaster, setupSocketIO } from './socket';
import { MemorySettlementStore } from './store/memory.store';
import { SupabaseSettlementStore } from './store/supabase.store';
import { SettlementStore } from './store/types';

async function createStore(config: EnvConfig): Promise<SettlementStore> {
  const initial: ProtocolConfig = {
    owner_id: config.OWNER_ID,
    oracle_id: config.ORACLE_ID,
    minimum_stake: config.MIN_STAKE,
    fee_percent: config.FEE_PERCENT,
    next_market_id: 0,
  };

  if (config.STORE_PROVIDER === 'supabase') {
    const store = new SupabaseSettlementStore(createSupabaseAdmin(config));
    await store.seedProtocol(initial);
    return store;
  }

  console.warn('[STORE] Using the in-memory store; state is lost on restart');
  return new MemorySettlementStore(initial);
}

async function main() {
  const config = loadConfig();
  const store = await createStore(config);

  const engine = new SettlementEngine(
    {
      store,
      height: new ClockHeightSource(config.GENESIS_TIME, config.BLOCK_TIME_MS),
      poolAccount: config.POOL_ACCOUNT_ID,
    },
    { duplicatePolicy: config.DUPLICATE_PREDICTION_POLICY }
  );

  // The app needs the broadcaster and the socket server needs the HTTP server,
  // so the server is created first and the handler attached afterwards
  const server = createServer();
  const io = new SocketIOServer(server, {
    cors: {
      origin: config.CORS_ORIGIN,
      credentials: true,
    },
  });
  setupSocketIO(io, config.JWT_SECRET);

  const app = createApp({
    engine,
    jwtSecret: config.JWT_SECRET,
    corsOrigin: config.CORS_ORIGIN,
    nodeEnv: config.NODE_ENV,
    broadcaster: new MarketBroadcaster(io),
  });
  server.on('request', app);

  server.listen(config.PORT, () => {
    console.log(`🚀 Server running on port ${config.PORT}`);
    console.log(`📝 Environment: ${config.NODE_ENV}`);
    console.log(`🗄️  Store: ${config.STORE_PROVIDER}`);
    console.log(`🔗 Health check: http://localhost:${config.PORT}/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} signal received: closing HTTP server`);
    io.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
