/**
 * Ledger API Validation Rules
 *
 * Only request shapes are checked here. Ledger rules (percentage range,
 * positive amounts) are left to the engine so its error kinds reach the caller.
 */

import { body, param } from 'express-validator';

const bandIdParam = param('bandId')
  .isInt({ min: 1 })
  .withMessage('bandId must be a positive integer')
  .toInt();

const memberParam = param('member')
  .isString()
  .isLength({ min: 1, max: 128 })
  .withMessage('member must be between 1 and 128 characters');

export const createBandValidation = [
  body('name')
    .isString()
    .withMessage('name must be a string')
    .trim()
    .isLength({ min: 1, max: 50 })
    .withMessage('name must be between 1 and 50 characters'),
];

export const bandParamValidation = [bandIdParam];

export const memberParamValidation = [bandIdParam, memberParam];

export const addMemberValidation = [
  bandIdParam,
  body('member')
    .isString()
    .withMessage('member must be a string')
    .isLength({ min: 1, max: 128 })
    .withMessage('member must be between 1 and 128 characters'),
  body('name')
    .isString()
    .withMessage('name must be a string')
    .trim()
    .isLength({ min: 1, max: 50 })
    .withMessage('name must be between 1 and 50 characters'),
  body('percentage')
    .isInt()
    .withMessage('percentage must be an integer')
    .toInt(),
];

export const updatePercentageValidation = [
  bandIdParam,
  memberParam,
  body('percentage')
    .isInt()
    .withMessage('percentage must be an integer')
    .toInt(),
];

export const depositValidation = [
  bandIdParam,
  body('amount')
    .notEmpty()
    .withMessage('amount is required')
    .isInt()
    .withMessage('amount must be an integer in the smallest currency unit')
    .toInt(),
];
