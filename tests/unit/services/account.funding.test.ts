/**
 * Account funding under production configuration
 *
 * Loads config, accounts and ledger fresh with NODE_ENV=production so the
 * funding route and a band deposit run against production settings.
 */

import { Response } from 'express';
import { AuthRequest } from '../../../src/auth/auth.types';

const PRODUCTION_ENV: Record<string, string> = {
  NODE_ENV: 'production',
  JWT_SECRET: 'test-secret-for-production-config-only',
  REDIS_HOST: 'redis.invalid',
  REDIS_PASSWORD: 'test-password',
  CORS_ORIGINS: 'https://bands.example.com',
  LOG_LEVEL: 'silent',
};

const mockResponse = () => {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
};

const fundRequest = (principal: string, amount: number): AuthRequest => {
  const req = { principal, body: { amount } };
  return req as unknown as AuthRequest;
};

describe('Account funding in production', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    jest.resetModules();
    for (const [key, value] of Object.entries(PRODUCTION_ENV)) {
      saved[key] = process.env[key];
      process.env[key] = value;
    }
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    delete process.env.ACCOUNT_FUNDING_ENABLED;
  });

  it('should fund an account that can then pay into a band', async () => {
    const { config } = await import('../../../src/config');
    const { accountController } = await import('../../../src/services/account/account.controller');
    const { accountService } = await import('../../../src/services/account/account.service');
    const { ledgerEngine } = await import('../../../src/services/ledger/ledger.service');

    expect(config.isProduction).toBe(true);
    expect(config.ledger.fundingEnabled).toBe(true);

    const res = mockResponse();
    const next = jest.fn();
    accountController.fund(fundRequest('payer', 1000), res as unknown as Response, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({
      success: true,
      data: { message: 'Account funded', account: { principal: 'payer', balance: 1000 } },
    });

    const bandId = ledgerEngine.createBand('Night Shift', 'owner');
    ledgerEngine.depositPayment(bandId, 600, 'payer');

    expect(ledgerEngine.getBandBalance(bandId)).toEqual({ balance: 600 });
    expect(accountService.getAccount('payer')).toEqual({ principal: 'payer', balance: 400 });
    expect(accountService.getAccount(config.ledger.custodyAccount)).toEqual({
      principal: config.ledger.custodyAccount,
      balance: 600,
    });
  });

  it('should refuse funding when switched off explicitly', async () => {
    process.env.ACCOUNT_FUNDING_ENABLED = 'false';
    const { accountController } = await import('../../../src/services/account/account.controller');
    const { ErrorCode } = await import('../../../src/types/errors');

    const res = mockResponse();
    const next = jest.fn();
    accountController.fund(fundRequest('payer', 1000), res as unknown as Response, next);

    expect(res.status).not.toHaveBeenCalled();
    expect(next).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: ErrorCode.FUNDING_DISABLED, statusCode: 403 })
    );
  });
});
