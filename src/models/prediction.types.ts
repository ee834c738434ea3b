import { Market } from './market.types';

export const DIRECTIONS = ['up', 'down'] as const;

export type Direction = (typeof DIRECTIONS)[number];

export interface Prediction {
  market_id: number;
  participant: string;
  direction: Direction;
  stake: bigint;
  claimed: boolean;
}

export interface PredictionReceipt {
  prediction: Prediction;
  // Market totals after the stake was added
  market: Market;
}

export interface SubmitPredictionDto {
  // Validated by the ledger, not the route schema
  direction: string;
  stake: bigint;
}

export interface PayoutBreakdown {
  winnings: bigint;
  fee: bigint;
  payout: bigint;
}

export interface ClaimReceipt extends PayoutBreakdown {
  market_id: number;
  participant: string;
}

export interface PayoutQuote extends PayoutBreakdown {
  market_id: number;
  direction: Direction;
  stake: bigint;
}

export type DuplicatePredictionPolicy = 'overwrite' | 'reject';
