import { z } from 'zod';
import { requireUser } from '../middleware/auth';
import { ValidatedHandler } from '../middleware/validation';
import {
  emptyRequestSchema,
  setFeePercentageSchema,
  setMinimumStakeSchema,
  setOracleSchema,
  withdrawFeesSchema,
} from '../routes/protocol.schemas';
import { getBroadcaster, getEngine } from '../utils/app-context';
import { serialize } from '../utils/uint';

type EmptyRequest = z.infer<typeof emptyRequestSchema>;

export const getProtocol: ValidatedHandler<EmptyRequest> = async (_input, req, res) => {
  const protocol = await getEngine(req).protocol.getProtocol();

  res.json({
    success: true,
    protocol: serialize(protocol),
  });
};

export const getPoolBalance: ValidatedHandler<EmptyRequest> = async (_input, req, res) => {
  const balance = await getEngine(req).protocol.getPoolBalance();

  res.json({
    success: true,
    pool_balance: balance.toString(),
  });
};

export const setOracleAddress: ValidatedHandler<z.infer<typeof setOracleSchema>> = async ({ body }, req, res) => {
  const protocol = await getEngine(req).protocol.setOracleAddress(requireUser(req), body.oracle_id);
  getBroadcaster(req).protocolUpdated(protocol);

  res.json({ success: true, protocol: serialize(protocol) });
};

export const setMinimumStake: ValidatedHandler<z.infer<typeof setMinimumStakeSchema>> = async ({ body }, req, res) => {
  const protocol = await getEngine(req).protocol.setMinimumStake(requireUser(req), body.minimum_stake);
  getBroadcaster(req).protocolUpdated(protocol);

  res.json({ success: true, protocol: serialize(protocol) });
};

export const setFeePercentage: ValidatedHandler<z.infer<typeof setFeePercentageSchema>> = async (
  { body },
  req,
  res
) => {
  const protocol = await getEngine(req).protocol.setFeePercentage(requireUser(req), body.fee_percent);
  getBroadcaster(req).protocolUpdated(protocol);

  res.json({ success: true, protocol: serialize(protocol) });
};

export const withdrawFees: ValidatedHandler<z.infer<typeof withdrawFeesSchema>> = async ({ body }, req, res) => {
  const withdrawal = await getEngine(req).protocol.withdrawFees(requireUser(req), body.amount);

  res.json({
    success: true,
    withdrawal: serialize(withdrawal),
  });
};
