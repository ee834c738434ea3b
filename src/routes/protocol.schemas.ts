import { z } from 'zod';
import { uintSchema } from '../utils/uint';

// Read endpoints take no input
export const emptyRequestSchema = z.object({});

export const setOracleSchema = z.object({
  body: z.object({
    oracle_id: z.string().min(1).max(256),
  }),
});

export const setMinimumStakeSchema = z.object({
  body: z.object({
    minimum_stake: uintSchema,
  }),
});

export const setFeePercentageSchema = z.object({
  body: z.object({
    fee_percent: z.number().int(),
  }),
});

export const withdrawFeesSchema = z.object({
  body: z.object({
    amount: uintSchema,
  }),
});
