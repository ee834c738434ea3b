import { Router } from 'express';
import * as marketsController from '../controllers/markets.controller';
import { authenticateUser } from '../middleware/auth';
import { validate } from '../middleware/validation';
import {
  createMarketSchema,
  listMarketsSchema,
  marketIdParamsSchema,
  quotePayoutSchema,
  resolveMarketSchema,
  submitPredictionSchema,
  userPredictionSchema,
} from './markets.schemas';

const router = Router();

// Public reads
router.get('/', validate(listMarketsSchema, marketsController.listMarkets));
router.get('/:id', validate(marketIdParamsSchema, marketsController.getMarket));
router.get('/:id/quote', validate(quotePayoutSchema, marketsController.quotePayout));
router.get('/:id/predictions', validate(marketIdParamsSchema, marketsController.listMarketPredictions));
router.get('/:id/predictions/:participant', validate(userPredictionSchema, marketsController.getUserPrediction));

// Mutations
router.post('/', authenticateUser, validate(createMarketSchema, marketsController.createMarket));
router.post('/:id/predictions', authenticateUser, validate(submitPredictionSchema, marketsController.submitPrediction));
router.post('/:id/resolve', authenticateUser, validate(resolveMarketSchema, marketsController.resolveMarket));
router.post('/:id/claim', authenticateUser, validate(marketIdParamsSchema, marketsController.claimWinnings));

export default router;
