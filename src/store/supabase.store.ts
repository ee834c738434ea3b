import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { Market } from '../models/market.types';
import { DIRECTIONS, Prediction } from '../models/prediction.types';
import { ProtocolConfig } from '../models/protocol.types';
import { InsufficientBalanceError, InvalidParameterError, StoreError } from '../utils/errors';
import { SerialQueue } from '../utils/serial-queue';
import { serialize, Serialized, uintSchema } from '../utils/uint';
import { predictionKey, SettlementStore, StoreTransaction } from './types';

const PROTOCOL_COLUMNS = 'owner_id, oracle_id, minimum_stake::text, fee_percent, next_market_id';
const MARKET_COLUMNS =
  'id, start_price::text, end_price::text, total_up_stake::text, total_down_stake::text, start_block::text, end_block::text, resolved';
const PREDICTION_COLUMNS = 'market_id, participant, direction, stake::text, claimed';

const protocolRowSchema = z.object({
  owner_id: z.string(),
  oracle_id: z.string(),
  minimum_stake: uintSchema,
  fee_percent: z.number().int().min(0).max(100),
  next_market_id: z.coerce.number().int().nonnegative(),
});

const marketRowSchema = z.object({
  id: z.coerce.number().int().nonnegative(),
  start_price: uintSchema,
  end_price: uintSchema,
  total_up_stake: uintSchema,
  total_down_stake: uintSchema,
  start_block: uintSchema,
  end_block: uintSchema,
  resolved: z.boolean(),
});

const predictionRowSchema = z.object({
  market_id: z.coerce.number().int().nonnegative(),
  participant: z.string(),
  direction: z.enum(DIRECTIONS),
  stake: uintSchema,
  claimed: z.boolean(),
});

const accountRowSchema = z.object({
  balance: uintSchema,
});

export type SettlementOp =
  | { kind: 'protocol'; row: Serialized<ProtocolConfig> }
  | { kind: 'market'; row: Serialized<Market> }
  | { kind: 'prediction'; row: Serialized<Prediction> }
  | { kind: 'transfer'; amount: string; from: string; to: string };

const INSUFFICIENT_BALANCE_PATTERN = /INSUFFICIENT_BALANCE:(\S+)/;

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, table: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StoreError(`read ${table}`, parsed.error.message);
  }
  return parsed.data;
}

class SupabaseReader {
  constructor(protected readonly client: SupabaseClient) {}

  async readProtocol(): Promise<ProtocolConfig> {
    const { data, error } = await this.client
      .from('protocol_config')
      .select(PROTOCOL_COLUMNS)
      .eq('id', 1)
      .maybeSingle();

    if (error) throw new StoreError('read protocol_config', error.message);
    if (!data) throw new StoreError('read protocol_config', 'protocol configuration has not been seeded');
    return parseRow(protocolRowSchema, data, 'protocol_config');
  }

  async readMarket(id: number): Promise<Market | null> {
    const { data, error } = await this.client.from('markets').select(MARKET_COLUMNS).eq('id', id).maybeSingle();

    if (error) throw new StoreError('read markets', error.message);
    return data ? parseRow(marketRowSchema, data, 'markets') : null;
  }

  async readPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    const { data, error } = await this.client
      .from('predictions')
      .select(PREDICTION_COLUMNS)
      .eq('market_id', marketId)
      .eq('participant', participant)
      .maybeSingle();

    if (error) throw new StoreError('read predictions', error.message);
    return data ? parseRow(predictionRowSchema, data, 'predictions') : null;
  }

  async readBalance(account: string): Promise<bigint> {
    const { data, error } = await this.client
      .from('accounts')
      .select('balance::text')
      .eq('account_id', account)
      .maybeSingle();

    if (error) throw new StoreError('read accounts', error.message);
    return data ? parseRow(accountRowSchema, data, 'accounts').balance : 0n;
  }
}

class SupabaseTransaction extends SupabaseReader implements StoreTransaction {
  private protocol: ProtocolConfig | null = null;
  private readonly markets = new Map<number, Market>();
  private readonly predictions = new Map<string, Prediction>();
  private readonly balances = new Map<string, bigint>();
  readonly ops: SettlementOp[] = [];

  async getProtocol(): Promise<ProtocolConfig> {
    return { ...(this.protocol ?? (await this.readProtocol())) };
  }

  putProtocol(protocol: ProtocolConfig): void {
    this.protocol = { ...protocol };
    this.ops.push({ kind: 'protocol', row: serialize(protocol) });
  }

  async getMarket(id: number): Promise<Market | null> {
    const staged = this.markets.get(id);
    return staged ? { ...staged } : this.readMarket(id);
  }

  putMarket(market: Market): void {
    this.markets.set(market.id, { ...market });
    this.ops.push({ kind: 'market', row: serialize(market) });
  }

  async getPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    const staged = this.predictions.get(predictionKey(marketId, participant));
    return staged ? { ...staged } : this.readPrediction(marketId, participant);
  }

  putPrediction(prediction: Prediction): void {
    this.predictions.set(predictionKey(prediction.market_id, prediction.participant), { ...prediction });
    this.ops.push({ kind: 'prediction', row: serialize(prediction) });
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.balances.get(account) ?? this.readBalance(account);
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
    this.ops.push({ kind: 'transfer', amount: amount.toString(), from, to });
  }

  async commit(): Promise<void> {
    if (this.ops.length === 0) return;

    const { error } = await this.client.rpc('apply_settlement_ops', { p_ops: this.ops });
    if (error) {
      const overdrawn = INSUFFICIENT_BALANCE_PATTERN.exec(error.message);
      if (overdrawn) {
        throw new InsufficientBalanceError(overdrawn[1]);
      }
      throw new StoreError('apply_settlement_ops', error.message);
    }
  }
}

/**
 * Postgres-backed store. Reads go straight to the tables; writes are staged
 * and committed by the apply_settlement_ops function in a single database
 * transaction.
 */
export class SupabaseSettlementStore extends SupabaseReader implements SettlementStore {
  private readonly queue = new SerialQueue();

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const tx = new SupabaseTransaction(this.client);
      const result = await work(tx);
      await tx.commit();
      return result;
    });
  }

  /**
   * Inserts the protocol row when the table is empty. An existing row wins:
   * the owner identity is immutable once deployed.
   */
  async seedProtocol(initial: ProtocolConfig): Promise<ProtocolConfig> {
    const { error } = await this.client
      .from('protocol_config')
      .upsert({ id: 1, ...serialize(initial) }, { onConflict: 'id', ignoreDuplicates: true });

    if (error) throw new StoreError('seed protocol_config', error.message);

    const stored = await this.readProtocol();
    if (stored.owner_id !== initial.owner_id) {
      console.warn('[STORE] Configured OWNER_ID differs from the deployed owner; keeping', stored.owner_id);
    }
    return stored;
  }

  getProtocol(): Promise<ProtocolConfig> {
    return this.readProtocol();
  }

  getMarket(id: number): Promise<Market | null> {
    return this.readMarket(id);
  }

  async listMarkets(): Promise<Market[]> {
    const { data, error } = await this.client.from('markets').select(MARKET_COLUMNS).order('id', { ascending: true });

    if (error) throw new StoreError('list markets', error.message);
    return (data ?? []).map((row) => parseRow(marketRowSchema, row, 'markets'));
  }

  getPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    return this.readPrediction(marketId, participant);
  }

  async listPredictions(marketId: number): Promise<Prediction[]> {
    const { data, error } = await this.client
      .from('predictions')
      .select(PREDICTION_COLUMNS)
      .eq('market_id', marketId)
      .order('participant', { ascending: true });

    if (error) throw new StoreError('list predictions', error.message);
    return (data ?? []).map((row) => parseRow(predictionRowSchema, row, 'predictions'));
  }

  balanceOf(account: string): Promise<bigint> {
    return this.readBalance(account);
  }
}
