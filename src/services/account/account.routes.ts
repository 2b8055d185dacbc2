import { Router, Request, Response, NextFunction } from 'express';
import { accountController } from './account.controller';
import { authMiddleware } from '../../auth';
import { fundValidation } from './account.validation';
import { validateRequest } from '../../middlewares/validateRequest';

const router = Router();

// All account routes require authentication
router.use(authMiddleware);

// GET /accounts/me - Caller's account balance
router.get('/me', (req: Request, res: Response, next: NextFunction) => accountController.getMyAccount(req, res, next));

// POST /accounts/me/fund - Top up the caller's account (disabled in production)
router.post('/me/fund', fundValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => accountController.fund(req, res, next));

export default router;
