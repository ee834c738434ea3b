import { Market } from '../models/market.types';
import { Prediction } from '../models/prediction.types';
import { ProtocolConfig } from '../models/protocol.types';

/**
 * Asset-transfer primitive. Transfers that would overdraw `from` fail with
 * InsufficientBalanceError and abort the enclosing transaction.
 */
export interface Escrow {
  balanceOf(account: string): Promise<bigint>;
  transfer(amount: bigint, from: string, to: string): Promise<void>;
}

/**
 * Staged view of the store. Nothing written here is visible outside the
 * transaction until it commits.
 */
export interface StoreTransaction extends Escrow {
  getProtocol(): Promise<ProtocolConfig>;
  putProtocol(protocol: ProtocolConfig): void;
  getMarket(id: number): Promise<Market | null>;
  putMarket(market: Market): void;
  getPrediction(marketId: number, participant: string): Promise<Prediction | null>;
  putPrediction(prediction: Prediction): void;
}

export interface SettlementStore {
  /**
   * Runs `work` as one atomic unit. Units are serialized: at most one is in
   * flight per store instance. If `work` throws, every staged write and
   * transfer is discarded.
   */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  getProtocol(): Promise<ProtocolConfig>;
  getMarket(id: number): Promise<Market | null>;
  listMarkets(): Promise<Market[]>;
  getPrediction(marketId: number, participant: string): Promise<Prediction | null>;
  listPredictions(marketId: number): Promise<Prediction[]>;
  balanceOf(account: string): Promise<bigint>;
}

export function predictionKey(marketId: number, participant: string): string {
  return `${marketId}:${participant}`;
}
