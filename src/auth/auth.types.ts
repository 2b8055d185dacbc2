import { Request } from 'express';

import { Principal } from '../services/ledger/ledger.types';

export interface JWTPayload {
  principal: Principal;
  iat?: number;
  exp?: number;
}

export interface AuthRequest extends Request {
  principal?: Principal;
}
