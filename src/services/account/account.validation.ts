import { body } from 'express-validator';

export const fundValidation = [
  body('amount')
    .notEmpty()
    .withMessage('amount is required')
    .isInt({ min: 1 })
    .withMessage('amount must be a positive integer in the smallest currency unit')
    .toInt(),
];
