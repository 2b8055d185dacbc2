/**
 * Account Service
 *
 * In-process asset ledger behind the AssetTransfer port. Every principal has
 * an integer balance; the custody account holds the pooled funds of all
 * bands. A transfer either moves the full amount or throws and moves nothing.
 */

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { ErrorCode } from '../../types/errors';
import { AssetTransfer, Principal } from '../ledger/ledger.types';

const log = createServiceLogger('account-service');

export interface Account {
  principal: Principal;
  balance: number;
}

const isValidAmount = (amount: number): boolean =>
  Number.isSafeInteger(amount) && amount > 0;

export class AccountService implements AssetTransfer {
  private readonly balances = new Map<Principal, number>();

  constructor(private readonly custodyAccount: Principal) {}

  getAccount(principal: Principal): Account {
    return {
      principal,
      balance: this.balances.get(principal) ?? 0,
    };
  }

  /**
   * Credit newly issued funds to an account (testing/admin top-up)
   */
  fund(principal: Principal, amount: number): Account {
    if (!isValidAmount(amount)) {
      throw ApiError.invalidAmount();
    }

    if (principal === this.custodyAccount) {
      throw new ApiError(ErrorCode.NOT_AUTHORIZED, 'The custody account cannot be funded directly');
    }

    const balance = this.balances.get(principal) ?? 0;
    if (!Number.isSafeInteger(balance + amount)) {
      throw ApiError.invalidAmount('Funding would overflow the account balance');
    }

    this.balances.set(principal, balance + amount);
    log.info({ principal, amount, newBalance: balance + amount }, 'Account funded');

    return this.getAccount(principal);
  }

  transfer(from: Principal, to: Principal, amount: number): void {
    if (!isValidAmount(amount)) {
      throw ApiError.invalidAmount();
    }

    if (from === to) {
      throw new ApiError(ErrorCode.INVALID_INPUT, 'Cannot transfer to the same account');
    }

    const fromBalance = this.balances.get(from) ?? 0;
    if (fromBalance < amount) {
      throw ApiError.insufficientFunds(
        `Account ${from} holds ${fromBalance}, cannot transfer ${amount}`
      );
    }

    const toBalance = this.balances.get(to) ?? 0;
    if (!Number.isSafeInteger(toBalance + amount)) {
      throw ApiError.invalidAmount('Transfer would overflow the receiving account');
    }

    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, toBalance + amount);
    log.debug({ from, to, amount }, 'Transfer completed');
  }
}

export const accountService = new AccountService(config.ledger.custodyAccount);
