import { DuplicatePredictionPolicy } from '../models/prediction.types';
import { EngineContext } from './context';
import { LedgerService } from './ledger.service';
import { MarketService } from './market.service';
import { ProtocolService } from './protocol.service';
import { SettlementService } from './settlement.service';

export interface EngineOptions {
  duplicatePolicy: DuplicatePredictionPolicy;
}

export class SettlementEngine {
  readonly markets: MarketService;
  readonly ledger: LedgerService;
  readonly settlement: SettlementService;
  readonly protocol: ProtocolService;

  constructor(ctx: EngineContext, options: EngineOptions) {
    this.markets = new MarketService(ctx);
    this.ledger = new LedgerService(ctx, options.duplicatePolicy);
    this.settlement = new SettlementService(ctx);
    this.protocol = new ProtocolService(ctx);
  }
}
