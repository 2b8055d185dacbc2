import { Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { accountService } from './account.service';

export class AccountController {
  /**
   * Get the caller's account
   * GET /accounts/me
   */
  getMyAccount(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const account = accountService.getAccount(requirePrincipal(req));

      res.status(200).json({
        success: true,
        data: { account },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Top up the caller's account (testing/admin)
   * POST /accounts/me/fund
   */
  fund(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      if (!config.ledger.fundingEnabled) {
        throw new ApiError(ErrorCode.FUNDING_DISABLED, 'Account funding is disabled');
      }

      const account = accountService.fund(requirePrincipal(req), Number(req.body.amount));

      res.status(200).json({
        success: true,
        data: {
          message: 'Account funded',
          account,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const accountController = new AccountController();
