import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler';
import { JWT_SECRET_SETTING } from './middleware/auth';
import { SettlementEngine } from './services/engine.service';
import { MarketBroadcaster } from './socket';
import { BROADCASTER_SETTING, ENGINE_SETTING } from './utils/app-context';

import marketRoutes from './routes/markets.routes';
import protocolRoutes from './routes/protocol.routes';

export interface AppOptions {
  engine: SettlementEngine;
  jwtSecret: string;
  corsOrigin: string;
  nodeEnv: string;
  broadcaster?: MarketBroadcaster;
}

export function createApp(options: AppOptions): Express {
  const app: Express = express();

  app.set('env', options.nodeEnv);
  app.set(ENGINE_SETTING, options.engine);
  app.set(JWT_SECRET_SETTING, options.jwtSecret);
  if (options.broadcaster) {
    app.set(BROADCASTER_SETTING, options.broadcaster);
  }

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: options.corsOrigin,
      credentials: true,
    })
  );

  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  // Logging
  if (options.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (options.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: options.nodeEnv,
    });
  });

  app.use('/api/v1/markets', marketRoutes);
  app.use('/api/v1/protocol', protocolRoutes);

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
