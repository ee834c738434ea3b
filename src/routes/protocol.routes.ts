import { Router } from 'express';
import * as protocolController from '../controllers/protocol.controller';
import { authenticateUser } from '../middleware/auth';
import { validate } from '../middleware/validation';
import {
  emptyRequestSchema,
  setFeePercentageSchema,
  setMinimumStakeSchema,
  setOracleSchema,
  withdrawFeesSchema,
} from './protocol.schemas';

const router = Router();

router.get('/', validate(emptyRequestSchema, protocolController.getProtocol));
router.get('/pool-balance', validate(emptyRequestSchema, protocolController.getPoolBalance));

// Owner-only; the role check happens in the protocol service
router.put('/oracle', authenticateUser, validate(setOracleSchema, protocolController.setOracleAddress));
router.put('/minimum-stake', authenticateUser, validate(setMinimumStakeSchema, protocolController.setMinimumStake));
router.put('/fee-percentage', authenticateUser, validate(setFeePercentageSchema, protocolController.setFeePercentage));
router.post('/withdraw-fees', authenticateUser, validate(withdrawFeesSchema, protocolController.withdrawFees));

export default router;
