import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../services/market.service';
import { marketIdSchema, uintSchema } from '../utils/uint';

const marketParams = z.object({
  id: marketIdSchema,
});

export const listMarketsSchema = z.object({
  query: z.object({
    status: z.enum(['all', 'pending', 'open', 'closed', 'resolved']).default('all'),
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
  }),
});

export const createMarketSchema = z.object({
  body: z.object({
    start_price: uintSchema,
    start_block: uintSchema,
    end_block: uintSchema,
  }),
});

export const marketIdParamsSchema = z.object({
  params: marketParams,
});

export const userPredictionSchema = z.object({
  params: marketParams.extend({
    participant: z.string().min(1),
  }),
});

export const submitPredictionSchema = z.object({
  params: marketParams,
  body: z.object({
    // Direction values are checked by the ledger so it can report InvalidPrediction
    direction: z.string(),
    stake: uintSchema,
  }),
});

export const resolveMarketSchema = z.object({
  params: marketParams,
  body: z.object({
    end_price: uintSchema,
  }),
});

export const quotePayoutSchema = z.object({
  params: marketParams,
  query: z.object({
    direction: z.string(),
    stake: uintSchema,
  }),
});
