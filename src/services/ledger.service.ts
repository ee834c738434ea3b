import { Market } from '../models/market.types';
import {
  Direction,
  DIRECTIONS,
  DuplicatePredictionPolicy,
  Prediction,
  PredictionReceipt,
  SubmitPredictionDto,
} from '../models/prediction.types';
import {
  InsufficientBalanceError,
  InvalidPredictionError,
  MarketClosedError,
} from '../utils/errors';
import { EngineContext, requireMarket } from './context';

export function parseDirection(value: string): Direction {
  const direction = DIRECTIONS.find((candidate) => candidate === value.toLowerCase());
  if (!direction) {
    throw new InvalidPredictionError(`Direction must be one of: ${DIRECTIONS.join(', ')}`);
  }
  return direction;
}

export function isAcceptingPredictions(market: Market, height: bigint): boolean {
  return !market.resolved && height >= market.start_block && height < market.end_block;
}

function addStake(market: Market, direction: Direction, stake: bigint): Market {
  return direction === 'up'
    ? { ...market, total_up_stake: market.total_up_stake + stake }
    : { ...market, total_down_stake: market.total_down_stake + stake };
}

export class LedgerService {
  constructor(
    private readonly ctx: EngineContext,
    private readonly duplicatePolicy: DuplicatePredictionPolicy
  ) {}

  async submitPrediction(caller: string, marketId: number, dto: SubmitPredictionDto): Promise<PredictionReceipt> {
    return this.ctx.store.transaction(async (tx) => {
      const market = await requireMarket(tx, marketId);
      const height = await this.ctx.height.currentHeight();

      if (!isAcceptingPredictions(market, height)) {
        throw new MarketClosedError(
          `Market ${marketId} accepts predictions in blocks [${market.start_block}, ${market.end_block}), current height is ${height}`
        );
      }

      const direction = parseDirection(dto.direction);
      const protocol = await tx.getProtocol();

      if (dto.stake <= 0n || dto.stake < protocol.minimum_stake) {
        throw new InvalidPredictionError(`Stake must be at least ${protocol.minimum_stake}`);
      }

      const previous = await tx.getPrediction(marketId, caller);
      if (previous && this.duplicatePolicy === 'reject') {
        throw new InvalidPredictionError(`Participant already holds a prediction on market ${marketId}`);
      }

      if ((await tx.balanceOf(caller)) < dto.stake) {
        throw new InsufficientBalanceError(caller);
      }

      await tx.transfer(dto.stake, caller, this.ctx.poolAccount);

      const prediction: Prediction = {
        market_id: marketId,
        participant: caller,
        direction,
        stake: dto.stake,
        claimed: false,
      };
      tx.putPrediction(prediction);
      // The previous stake stays in the side totals; only the ledger entry is replaced
      const updated = addStake(market, direction, dto.stake);
      tx.putMarket(updated);

      if (previous) {
        console.warn(
          `[LEDGER] Prediction overwritten on market ${marketId} by ${caller}: ${previous.direction}/${previous.stake} -> ${direction}/${dto.stake}; previous stake remains pooled`
        );
      }
      return { prediction, market: updated };
    });
  }

  getUserPrediction(marketId: number, participant: string): Promise<Prediction | null> {
    return this.ctx.store.getPrediction(marketId, participant);
  }

  async listMarketPredictions(marketId: number): Promise<Prediction[]> {
    await requireMarket(this.ctx.store, marketId);
    return this.ctx.store.listPredictions(marketId);
  }
}
