import { Market } from '../models/market.types';
import { ClaimReceipt, Direction, PayoutBreakdown, PayoutQuote } from '../models/prediction.types';
import {
  AlreadyClaimedError,
  AlreadyResolvedError,
  InconsistentStateError,
  InvalidParameterError,
  InvalidPredictionError,
  MarketNotResolvedError,
  NotFoundError,
} from '../utils/errors';
import { EngineContext, requireMarket } from './context';
import { parseDirection } from './ledger.service';

/** Up wins only on a strictly higher end price; ties settle to Down. */
export function winningDirection(market: Pick<Market, 'start_price' | 'end_price'>): Direction {
  return market.end_price > market.start_price ? 'up' : 'down';
}

export function sideStake(market: Pick<Market, 'total_up_stake' | 'total_down_stake'>, direction: Direction): bigint {
  return direction === 'up' ? market.total_up_stake : market.total_down_stake;
}

/**
 * Pro-rata share of the whole pool for `stake` on the winning side, less the
 * protocol fee. Every division truncates, so the sum over all winners never
 * exceeds `totalStake`.
 */
export function computePayout(
  stake: bigint,
  totalStake: bigint,
  winningStake: bigint,
  feePercent: number
): PayoutBreakdown {
  if (winningStake === 0n) {
    throw new InconsistentStateError('Winning side has no recorded stake', {
      total_stake: totalStake.toString(),
    });
  }
  const winnings = (stake * totalStake) / winningStake;
  const fee = (winnings * BigInt(feePercent)) / 100n;
  return { winnings, fee, payout: winnings - fee };
}

export class SettlementService {
  constructor(private readonly ctx: EngineContext) {}

  async claimWinnings(caller: string, marketId: number): Promise<ClaimReceipt> {
    const receipt = await this.ctx.store.transaction(async (tx) => {
      const market = await requireMarket(tx, marketId);
      if (!market.resolved) {
        throw new MarketNotResolvedError();
      }

      const prediction = await tx.getPrediction(marketId, caller);
      if (!prediction) {
        throw new NotFoundError(`Prediction for market ${marketId}`);
      }
      if (prediction.claimed) {
        throw new AlreadyClaimedError();
      }

      const winner = winningDirection(market);
      if (prediction.direction !== winner) {
        throw new InvalidPredictionError(`Prediction did not pick the winning direction (${winner})`);
      }

      const protocol = await tx.getProtocol();
      const { winnings, fee, payout } = computePayout(
        prediction.stake,
        market.total_up_stake + market.total_down_stake,
        sideStake(market, winner),
        protocol.fee_percent
      );

      await tx.transfer(payout, this.ctx.poolAccount, caller);
      await tx.transfer(fee, this.ctx.poolAccount, protocol.owner_id);
      tx.putPrediction({ ...prediction, claimed: true });

      return { market_id: marketId, participant: caller, winnings, fee, payout };
    });

    console.log(`[SETTLEMENT] ${caller} claimed ${receipt.payout} (fee ${receipt.fee}) on market ${marketId}`);
    return receipt;
  }

  /**
   * Estimates what `stake` on `direction` would pay if placed now and that
   * side went on to win. Nothing is written.
   */
  async quotePayout(marketId: number, direction: string, stake: bigint): Promise<PayoutQuote> {
    const market = await requireMarket(this.ctx.store, marketId);
    if (market.resolved) {
      throw new AlreadyResolvedError();
    }
    const side = parseDirection(direction);
    if (stake <= 0n) {
      throw new InvalidParameterError('Stake must be greater than 0');
    }

    const protocol = await this.ctx.store.getProtocol();
    const breakdown = computePayout(
      stake,
      market.total_up_stake + market.total_down_stake + stake,
      sideStake(market, side) + stake,
      protocol.fee_percent
    );
    return { market_id: marketId, direction: side, stake, ...breakdown };
  }
}
