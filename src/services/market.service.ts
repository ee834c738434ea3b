import { CreateMarketDto, ListMarketsQuery, Market, MarketPage, MarketStatus } from '../models/market.types';
import {
  AlreadyResolvedError,
  InvalidParameterError,
  MarketClosedError,
} from '../utils/errors';
import { assertRole, logAdminAction } from './access.service';
import { EngineContext, requireMarket } from './context';

export const MAX_PAGE_SIZE = 100;

/**
 * Lifecycle position of a market at `height`. `pending` precedes the window,
 * `open` is [start_block, end_block), `closed` waits for the oracle.
 */
export function marketStatus(market: Market, height: bigint): MarketStatus {
  if (market.resolved) return 'resolved';
  if (height < market.start_block) return 'pending';
  if (height < market.end_block) return 'open';
  return 'closed';
}

export class MarketService {
  constructor(private readonly ctx: EngineContext) {}

  async createMarket(caller: string, dto: CreateMarketDto): Promise<Market> {
    const market = await this.ctx.store.transaction(async (tx) => {
      const protocol = await tx.getProtocol();
      assertRole(protocol, caller, 'owner');

      if (dto.start_price <= 0n) {
        throw new InvalidParameterError('Start price must be greater than 0');
      }
      if (dto.end_block <= dto.start_block) {
        throw new InvalidParameterError('End block must be greater than start block');
      }

      const created: Market = {
        id: protocol.next_market_id,
        start_price: dto.start_price,
        end_price: 0n,
        total_up_stake: 0n,
        total_down_stake: 0n,
        start_block: dto.start_block,
        end_block: dto.end_block,
        resolved: false,
      };

      tx.putMarket(created);
      tx.putProtocol({ ...protocol, next_market_id: protocol.next_market_id + 1 });
      return created;
    });

    logAdminAction(caller, 'owner', 'create_market', { market_id: market.id });
    console.log(`[MARKETS] Market ${market.id} created for blocks [${market.start_block}, ${market.end_block})`);
    return market;
  }

  async resolveMarket(caller: string, marketId: number, endPrice: bigint): Promise<Market> {
    const market = await this.ctx.store.transaction(async (tx) => {
      assertRole(await tx.getProtocol(), caller, 'oracle');

      const existing = await requireMarket(tx, marketId);
      const height = await this.ctx.height.currentHeight();

      if (height < existing.end_block) {
        throw new MarketClosedError(`Market has not reached its end block (${existing.end_block})`);
      }
      if (existing.resolved) {
        throw new AlreadyResolvedError();
      }
      if (endPrice <= 0n) {
        throw new InvalidParameterError('End price must be greater than 0');
      }

      const resolved: Market = { ...existing, end_price: endPrice, resolved: true };
      tx.putMarket(resolved);
      return resolved;
    });

    logAdminAction(caller, 'oracle', 'resolve_market', { market_id: marketId, end_price: endPrice });
    console.log(`[MARKETS] Market ${marketId} resolved at ${endPrice} (start ${market.start_price})`);
    return market;
  }

  getMarket(marketId: number): Promise<Market | null> {
    return this.ctx.store.getMarket(marketId);
  }

  async listMarkets(query: ListMarketsQuery): Promise<MarketPage> {
    const limit = Math.min(Math.max(query.limit, 1), MAX_PAGE_SIZE);
    const page = Math.max(query.page, 1);
    const height = await this.ctx.height.currentHeight();

    const all = await this.ctx.store.listMarkets();
    const matching =
      query.status === 'all' ? all : all.filter((market) => marketStatus(market, height) === query.status);

    return {
      height,
      markets: matching.slice((page - 1) * limit, page * limit),
      total: matching.length,
      page,
      limit,
    };
  }

  currentHeight(): Promise<bigint> {
    return this.ctx.height.currentHeight();
  }
}
