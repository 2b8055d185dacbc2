import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { Principal } from '../services/ledger/ledger.types';

import { JWTPayload } from './auth.types';

/**
 * Caller identity tokens.
 *
 * Tokens are issued by the identity provider that shares JWT_SECRET;
 * generateToken exists for tooling and tests.
 */
export class AuthService {
  generateToken(principal: Principal): string {
    const options: SignOptions = {
      expiresIn: config.jwt.accessTokenExpiresIn as SignOptions['expiresIn'],
      ...(config.jwt.issuer ? { issuer: config.jwt.issuer } : {}),
    };

    const payload: JWTPayload = { principal };
    return jwt.sign(payload, config.jwt.secret, options);
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, config.jwt.secret, {
        ...(config.jwt.issuer ? { issuer: config.jwt.issuer } : {}),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || typeof decoded.principal !== 'string' || !decoded.principal) {
      throw ApiError.invalidToken('Token carries no principal');
    }

    return {
      principal: decoded.principal,
      iat: decoded.iat,
      exp: decoded.exp,
    };
  }
}

export const authService = new AuthService();
