import { Response, NextFunction } from 'express';
import { requirePrincipal } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability';
import { ledgerService } from './ledger.service';

const bandIdOf = (req: AuthRequest): number => {
  const bandId = Number(req.params.bandId);
  addLogContext({ bandId });
  return bandId;
};

export class LedgerController {
  /**
   * Create a band owned by the caller
   * POST /bands
   */
  async createBand(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const { bandId, band } = await ledgerService.createBand(String(req.body.name), caller);

      res.status(201).json({
        success: true,
        data: { bandId, ...band },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /bands/count
   */
  getTotalBands(_req: AuthRequest, res: Response): void {
    res.status(200).json({
      success: true,
      data: { totalBands: ledgerService.getTotalBands() },
    });
  }

  /**
   * Current value of the join sequence shared by all bands
   * GET /bands/join-order
   */
  getMemberJoinOrder(_req: AuthRequest, res: Response): void {
    res.status(200).json({
      success: true,
      data: { memberJoinOrder: ledgerService.getMemberJoinOrder() },
    });
  }

  /**
   * GET /bands/:bandId
   */
  getBand(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const bandId = bandIdOf(req);
      const band = ledgerService.getBandInfo(bandId);
      if (!band) {
        throw ApiError.notFound('Band');
      }

      res.status(200).json({
        success: true,
        data: { bandId, ...band },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /bands/:bandId/balance
   */
  getBalance(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const bandId = bandIdOf(req);
      const pool = ledgerService.getBandBalance(bandId);
      if (!pool) {
        throw ApiError.notFound('Band balance');
      }

      res.status(200).json({
        success: true,
        data: { bandId, balance: pool.balance },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Register a member (owner only)
   * POST /bands/:bandId/members
   */
  async addMember(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const bandId = bandIdOf(req);
      const member = String(req.body.member);

      const record = await ledgerService.addMember(
        bandId,
        member,
        String(req.body.name),
        Number(req.body.percentage),
        caller
      );

      res.status(201).json({
        success: true,
        data: { bandId, member, ...record },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /bands/:bandId/members/:member
   */
  getMember(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const bandId = bandIdOf(req);
      const { member } = req.params;
      const record = ledgerService.getMemberInfo(bandId, member);
      if (!record) {
        throw ApiError.notFound('Member');
      }

      res.status(200).json({
        success: true,
        data: { bandId, member, ...record },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Change a member's share (owner only)
   * PATCH /bands/:bandId/members/:member
   */
  async updateMemberPercentage(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const bandId = bandIdOf(req);
      const { member } = req.params;

      const record = await ledgerService.updateMemberPercentage(
        bandId,
        member,
        Number(req.body.percentage),
        caller
      );

      res.status(200).json({
        success: true,
        data: { bandId, member, ...record },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Share the member could withdraw right now
   * GET /bands/:bandId/members/:member/earnings
   */
  getEarnings(req: AuthRequest, res: Response, next: NextFunction): void {
    try {
      const bandId = bandIdOf(req);
      const { member } = req.params;
      const earnings = ledgerService.calculateMemberEarnings(bandId, member);
      if (earnings === undefined) {
        throw ApiError.notFound('Member');
      }

      res.status(200).json({
        success: true,
        data: { bandId, member, earnings },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /bands/:bandId/members/:member/membership
   */
  getMembership(req: AuthRequest, res: Response): void {
    const bandId = bandIdOf(req);
    const { member } = req.params;

    res.status(200).json({
      success: true,
      data: { bandId, member, isMember: ledgerService.isBandMember(bandId, member) },
    });
  }

  /**
   * Move funds from the caller into the band pool
   * POST /bands/:bandId/deposits
   */
  async deposit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const result = await ledgerService.depositPayment(
        bandIdOf(req),
        Number(req.body.amount),
        caller
      );

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Withdraw the caller's share of the live pool
   * POST /bands/:bandId/withdrawals
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const result = await ledgerService.withdrawEarnings(bandIdOf(req), caller);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Sweep the whole pool to the owner
   * POST /bands/:bandId/emergency-withdrawals
   */
  async emergencyWithdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const result = await ledgerService.emergencyWithdraw(bandIdOf(req), caller);

      res.status(200).json({
        success: true,
        data: result,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /bands/:bandId/deactivate
   */
  async deactivate(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const caller = requirePrincipal(req);
      const bandId = bandIdOf(req);
      const band = await ledgerService.deactivateBand(bandId, caller);

      res.status(200).json({
        success: true,
        data: { bandId, ...band },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const ledgerController = new LedgerController();
