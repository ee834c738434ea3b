export interface Market {
  id: number;
  start_price: bigint;
  // 0 until resolved
  end_price: bigint;
  total_up_stake: bigint;
  total_down_stake: bigint;
  start_block: bigint;
  end_block: bigint;
  resolved: boolean;
}

export type MarketStatus = 'open' | 'pending' | 'closed' | 'resolved';

export type MarketStatusFilter = 'all' | MarketStatus;

export interface CreateMarketDto {
  start_price: bigint;
  start_block: bigint;
  end_block: bigint;
}

export interface ResolveMarketDto {
  end_price: bigint;
}

export interface ListMarketsQuery {
  status: MarketStatusFilter;
  page: number;
  limit: number;
}

export interface MarketPage {
  // Height the status filter was evaluated at
  height: bigint;
  markets: Market[];
  total: number;
  page: number;
  limit: number;
}
