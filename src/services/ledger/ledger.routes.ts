import { Router, Request, Response, NextFunction } from 'express';
import { authMiddleware } from '../../auth';
import { idempotencyForMutations, validateIdempotencyKey } from '../../middlewares/idempotency';
import { ledgerLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { ledgerController } from './ledger.controller';
import {
  addMemberValidation,
  bandParamValidation,
  createBandValidation,
  depositValidation,
  memberParamValidation,
  updatePercentageValidation,
} from './ledger.validation';

const router = Router();

// All band routes require an authenticated caller
router.use(authMiddleware);

const mutation = [ledgerLimiter, validateIdempotencyKey, idempotencyForMutations];

// POST /bands - Create a band owned by the caller
router.post('/', mutation, createBandValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.createBand(req, res, next));

// GET /bands/count - Number of bands ever created
router.get('/count', (req: Request, res: Response) => ledgerController.getTotalBands(req, res));

// GET /bands/join-order - Current member join sequence
router.get('/join-order', (req: Request, res: Response) => ledgerController.getMemberJoinOrder(req, res));

// GET /bands/:bandId - Band info
router.get('/:bandId', bandParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.getBand(req, res, next));

// GET /bands/:bandId/balance - Pooled balance
router.get('/:bandId/balance', bandParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.getBalance(req, res, next));

// POST /bands/:bandId/members - Register a member (owner only)
router.post('/:bandId/members', mutation, addMemberValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.addMember(req, res, next));

// GET /bands/:bandId/members/:member - Member info
router.get('/:bandId/members/:member', memberParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.getMember(req, res, next));

// PATCH /bands/:bandId/members/:member - Update member percentage (owner only)
router.patch('/:bandId/members/:member', mutation, updatePercentageValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.updateMemberPercentage(req, res, next));

// GET /bands/:bandId/members/:member/earnings - Withdrawable share right now
router.get('/:bandId/members/:member/earnings', memberParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.getEarnings(req, res, next));

// GET /bands/:bandId/members/:member/membership - Membership check
router.get('/:bandId/members/:member/membership', memberParamValidation, validateRequest, (req: Request, res: Response) => ledgerController.getMembership(req, res));

// POST /bands/:bandId/deposits - Deposit into the band pool (any caller)
router.post('/:bandId/deposits', mutation, depositValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.deposit(req, res, next));

// POST /bands/:bandId/withdrawals - Withdraw the caller's share
router.post('/:bandId/withdrawals', mutation, bandParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.withdraw(req, res, next));

// POST /bands/:bandId/emergency-withdrawals - Sweep the pool to the owner
router.post('/:bandId/emergency-withdrawals', mutation, bandParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.emergencyWithdraw(req, res, next));

// POST /bands/:bandId/deactivate - Stop accepting deposits (owner only)
router.post('/:bandId/deactivate', mutation, bandParamValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => ledgerController.deactivate(req, res, next));

export default router;
