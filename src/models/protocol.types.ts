export interface ProtocolConfig {
  owner_id: string;
  oracle_id: string;
  minimum_stake: bigint;
  // 0-100
  fee_percent: number;
  next_market_id: number;
}

export type Role = 'owner' | 'oracle';

export interface WithdrawFeesDto {
  amount: bigint;
}
