import { Market } from '../models/market.types';
import { SettlementStore, StoreTransaction } from '../store/types';
import { NotFoundError } from '../utils/errors';
import { HeightSource } from './height.service';

export interface EngineContext {
  store: SettlementStore;
  height: HeightSource;
  // Escrow account holding every market's pooled collateral
  poolAccount: string;
}

export async function requireMarket(tx: Pick<StoreTransaction, 'getMarket'>, marketId: number): Promise<Market> {
  const market = await tx.getMarket(marketId);
  if (!market) {
    throw new NotFoundError(`Market ${marketId}`);
  }
  return market;
}
