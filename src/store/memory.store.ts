import { Market } from '../models/market.types';
import { Prediction } from '../models/prediction.types';
import { ProtocolConfig } from '../models/protocol.types';
import { InsufficientBalanceError, InvalidParameterError, StoreError } from '../utils/errors';
import { SerialQueue } from '../utils/serial-queue';
import { predictionKey, SettlementStore, StoreTransaction } from './types';

interface MemoryState {
  protocol: ProtocolConfig;
  markets: Map<number, Market>;
  predictions: Map<string, Prediction>;
  balances: Map<string, bigint>;
}

class MemoryTransaction implements StoreTransaction {
  private protocol: ProtocolConfig | null = null;
  private readonly markets = new Map<number, Market>();
  private readonly predictions = new Map<string, Prediction>();
  private readonly balances = new Map<string, bigint>();

  constructor(private readonly state: MemoryState) {}

  async getProtocol(): Promise<ProtocolConfig> {
    return { ...(this.protocol ?? this.state.protocol) };
  }

  putProtocol(protocol: ProtocolConfig): void {
    this.protocol = { ...protocol };
  }

  async getMarket(id: number): Promise<Market | null> {
    const market = this.markets.get(id) ?? this.state.markets.get(id);
    return market ? { ...market } : null;
  }

  putMarket(market: Market): void {
    this.markets.set(market.id, { ...market });
  }

  async getPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    const key = predictionKey(marketId, participant);
    const prediction = this.predictions.get(key) ?? this.state.predictions.get(key);
    return prediction ? { ...prediction } : null;
  }

  putPrediction(prediction: Prediction): void {
    this.predictions.set(predictionKey(prediction.market_id, prediction.participant), { ...prediction });
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.balances.get(account) ?? this.state.balances.get(account) ?? 0n;
  }

  async transfer(amount: bigint, from: string, to: string): Promise<void> {
    if (amount < 0n) {
      throw new InvalidParameterError('Transfer amount must not be negative');
    }
    const fromBalance = await this.balanceOf(from);
    if (fromBalance < amount) {
      throw new InsufficientBalanceError(from);
    }
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, (await this.balanceOf(to)) + amount);
  }

  commit(): void {
    if (this.protocol) this.state.protocol = this.protocol;
    for (const [id, market] of this.markets) this.state.markets.set(id, market);
    for (const [key, prediction] of this.predictions) this.state.predictions.set(key, prediction);
    for (const [account, balance] of this.balances) this.state.balances.set(account, balance);
  }
}

/**
 * In-process store. Used for local development and tests; state is lost on
 * restart.
 */
export class MemorySettlementStore implements SettlementStore {
  private readonly state: MemoryState;
  private readonly queue = new SerialQueue();

  constructor(protocol: ProtocolConfig) {
    this.state = {
      protocol: { ...protocol },
      markets: new Map(),
      predictions: new Map(),
      balances: new Map(),
    };
  }

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const tx = new MemoryTransaction(this.state);
      const result = await work(tx);
      tx.commit();
      return result;
    });
  }

  /** Mints funds into an account outside of any market flow. */
  credit(account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new StoreError('credit', 'amount must not be negative');
    }
    this.state.balances.set(account, (this.state.balances.get(account) ?? 0n) + amount);
  }

  async getProtocol(): Promise<ProtocolConfig> {
    return { ...this.state.protocol };
  }

  async getMarket(id: number): Promise<Market | null> {
    const market = this.state.markets.get(id);
    return market ? { ...market } : null;
  }

  async listMarkets(): Promise<Market[]> {
    return [...this.state.markets.values()].sort((a, b) => a.id - b.id).map((market) => ({ ...market }));
  }

  async getPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    const prediction = this.state.predictions.get(predictionKey(marketId, participant));
    return prediction ? { ...prediction } : null;
  }

  async listPredictions(marketId: number): Promise<Prediction[]> {
    return [...this.state.predictions.values()]
      .filter((prediction) => prediction.market_id === marketId)
      .sort((a, b) => (a.participant < b.participant ? -1 : a.participant > b.participant ? 1 : 0))
      .map((prediction) => ({ ...prediction }));
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.state.balances.get(account) ?? 0n;
  }
}
