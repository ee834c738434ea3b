import { ProtocolConfig } from '../models/protocol.types';
import { InsufficientBalanceError, InvalidParameterError } from '../utils/errors';
import { assertRole, logAdminAction } from './access.service';
import { EngineContext } from './context';

export interface FeeWithdrawal {
  amount: bigint;
  recipient: string;
  pool_balance: bigint;
}

export class ProtocolService {
  constructor(private readonly ctx: EngineContext) {}

  getProtocol(): Promise<ProtocolConfig> {
    return this.ctx.store.getProtocol();
  }

  getPoolBalance(): Promise<bigint> {
    return this.ctx.store.balanceOf(this.ctx.poolAccount);
  }

  setOracleAddress(caller: string, oracleId: string): Promise<ProtocolConfig> {
    return this.update(caller, 'set_oracle_address', (protocol) => {
      const next = oracleId.trim();
      if (next.length === 0) {
        throw new InvalidParameterError('Oracle identity must not be empty');
      }
      return { ...protocol, oracle_id: next };
    });
  }

  setMinimumStake(caller: string, minimumStake: bigint): Promise<ProtocolConfig> {
    return this.update(caller, 'set_minimum_stake', (protocol) => {
      if (minimumStake <= 0n) {
        throw new InvalidParameterError('Minimum stake must be greater than 0');
      }
      return { ...protocol, minimum_stake: minimumStake };
    });
  }

  setFeePercentage(caller: string, feePercent: number): Promise<ProtocolConfig> {
    return this.update(caller, 'set_fee_percentage', (protocol) => {
      if (!Number.isInteger(feePercent) || feePercent < 0 || feePercent > 100) {
        throw new InvalidParameterError('Fee percentage must be an integer between 0 and 100');
      }
      return { ...protocol, fee_percent: feePercent };
    });
  }

  /**
   * Moves `amount` from the pool to the owner. Only the total pool balance is
   * checked, so this can draw on collateral still owed to unclaimed winners.
   */
  async withdrawFees(caller: string, amount: bigint): Promise<FeeWithdrawal> {
    const withdrawal = await this.ctx.store.transaction(async (tx) => {
      const protocol = await tx.getProtocol();
      assertRole(protocol, caller, 'owner');

      if (amount <= 0n) {
        throw new InvalidParameterError('Withdrawal amount must be greater than 0');
      }
      const poolBalance = await tx.balanceOf(this.ctx.poolAccount);
      if (amount > poolBalance) {
        throw new InsufficientBalanceError(this.ctx.poolAccount);
      }

      await tx.transfer(amount, this.ctx.poolAccount, protocol.owner_id);
      return { amount, recipient: protocol.owner_id, pool_balance: poolBalance - amount };
    });

    logAdminAction(caller, 'owner', 'withdraw_fees', { amount });
    return withdrawal;
  }

  private async update(
    caller: string,
    action: string,
    apply: (protocol: ProtocolConfig) => ProtocolConfig
  ): Promise<ProtocolConfig> {
    const updated = await this.ctx.store.transaction(async (tx) => {
      const protocol = await tx.getProtocol();
      assertRole(protocol, caller, 'owner');

      const next = apply(protocol);
      tx.putProtocol(next);
      return next;
    });

    logAdminAction(caller, 'owner', action, {
      oracle_id: updated.oracle_id,
      minimum_stake: updated.minimum_stake,
      fee_percent: updated.fee_percent,
    });
    return updated;
  }
}
