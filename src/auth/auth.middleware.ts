import { Response, NextFunction } from 'express';
import { authService } from './auth.service';
import { AuthRequest } from './auth.types';
import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';
import { Principal } from '../services/ledger/ledger.types';
import { ErrorCode } from '../types/errors';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    const payload = authService.verifyToken(token);

    // The custody account only moves funds on behalf of the ledger
    if (payload.principal === config.ledger.custodyAccount) {
      throw new ApiError(ErrorCode.NOT_AUTHORIZED, 'The custody account cannot act as a caller');
    }

    req.principal = payload.principal;
    addLogContext({ principal: payload.principal });
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * Caller identity of an authenticated request
 */
export const requirePrincipal = (req: AuthRequest): Principal => {
  if (!req.principal) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.principal;
};
