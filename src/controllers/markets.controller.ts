import { z } from 'zod';
import { requireUser } from '../middleware/auth';
import { ValidatedHandler } from '../middleware/validation';
import {
  createMarketSchema,
  listMarketsSchema,
  marketIdParamsSchema,
  quotePayoutSchema,
  resolveMarketSchema,
  submitPredictionSchema,
  userPredictionSchema,
} from '../routes/markets.schemas';
import { marketStatus } from '../services/market.service';
import { getBroadcaster, getEngine } from '../utils/app-context';
import { NotFoundError } from '../utils/errors';
import { serialize } from '../utils/uint';

export const listMarkets: ValidatedHandler<z.infer<typeof listMarketsSchema>> = async ({ query }, req, res) => {
  const page = await getEngine(req).markets.listMarkets(query);

  res.json({
    success: true,
    height: page.height.toString(),
    markets: page.markets.map((market) => ({
      ...serialize(market),
      status: marketStatus(market, page.height),
    })),
    pagination: {
      page: page.page,
      limit: page.limit,
      total: page.total,
      totalPages: Math.ceil(page.total / page.limit),
    },
  });
};

export const createMarket: ValidatedHandler<z.infer<typeof createMarketSchema>> = async ({ body }, req, res) => {
  const caller = requireUser(req);
  const market = await getEngine(req).markets.createMarket(caller, body);

  getBroadcaster(req).marketCreated(market);

  res.status(201).json({
    success: true,
    market_id: market.id,
    market: serialize(market),
  });
};

export const getMarket: ValidatedHandler<z.infer<typeof marketIdParamsSchema>> = async ({ params }, req, res) => {
  const { markets } = getEngine(req);
  const market = await markets.getMarket(params.id);
  if (!market) {
    throw new NotFoundError(`Market ${params.id}`);
  }
  const height = await markets.currentHeight();

  res.json({
    success: true,
    market: {
      ...serialize(market),
      status: marketStatus(market, height),
    },
  });
};

export const quotePayout: ValidatedHandler<z.infer<typeof quotePayoutSchema>> = async ({ params, query }, req, res) => {
  const quote = await getEngine(req).settlement.quotePayout(params.id, query.direction, query.stake);

  res.json({
    success: true,
    quote: serialize(quote),
  });
};

export const listMarketPredictions: ValidatedHandler<z.infer<typeof marketIdParamsSchema>> = async (
  { params },
  req,
  res
) => {
  const predictions = await getEngine(req).ledger.listMarketPredictions(params.id);

  res.json({
    success: true,
    predictions: serialize(predictions),
  });
};

export const getUserPrediction: ValidatedHandler<z.infer<typeof userPredictionSchema>> = async (
  { params },
  req,
  res
) => {
  const prediction = await getEngine(req).ledger.getUserPrediction(params.id, params.participant);
  if (!prediction) {
    throw new NotFoundError(`Prediction for market ${params.id}`);
  }

  res.json({
    success: true,
    prediction: serialize(prediction),
  });
};

export const submitPrediction: ValidatedHandler<z.infer<typeof submitPredictionSchema>> = async (
  { params, body },
  req,
  res
) => {
  const caller = requireUser(req);
  const { prediction, market } = await getEngine(req).ledger.submitPrediction(caller, params.id, body);

  getBroadcaster(req).predictionSubmitted(prediction, market);

  res.status(201).json({
    success: true,
    prediction: serialize(prediction),
  });
};

export const resolveMarket: ValidatedHandler<z.infer<typeof resolveMarketSchema>> = async (
  { params, body },
  req,
  res
) => {
  const caller = requireUser(req);
  const market = await getEngine(req).markets.resolveMarket(caller, params.id, body.end_price);

  getBroadcaster(req).marketResolved(market);

  res.json({
    success: true,
    market: serialize(market),
  });
};

export const claimWinnings: ValidatedHandler<z.infer<typeof marketIdParamsSchema>> = async ({ params }, req, res) => {
  const caller = requireUser(req);
  const receipt = await getEngine(req).settlement.claimWinnings(caller, params.id);

  getBroadcaster(req).winningsClaimed(receipt);

  res.json({
    success: true,
    payout: receipt.payout.toString(),
    receipt: serialize(receipt),
  });
};
