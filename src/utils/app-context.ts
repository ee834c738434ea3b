import { Request } from 'express';
import { SettlementEngine } from '../services/engine.service';
import { MarketBroadcaster } from '../socket';

export const ENGINE_SETTING = 'engine';
export const BROADCASTER_SETTING = 'broadcaster';

export function getEngine(req: Request): SettlementEngine {
  const engine: unknown = req.app.get(ENGINE_SETTING);
  if (!(engine instanceof SettlementEngine)) {
    throw new Error('Settlement engine is not attached to the app');
  }
  return engine;
}

// Falls back to a silent broadcaster when no socket server is attached
export function getBroadcaster(req: Request): MarketBroadcaster {
  const broadcaster: unknown = req.app.get(BROADCASTER_SETTING);
  return broadcaster instanceof MarketBroadcaster ? broadcaster : new MarketBroadcaster(null);
}
