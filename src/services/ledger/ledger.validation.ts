/**
 * Ledger API Validation Rules
 */

import { body, param, query } from 'express-validator';

import { MAX_HISTORY_LIMIT } from './ledger.service';

const MAX_MANUAL_GRANT = 100000;

export const userIdParam = param('userId')
  .isString()
  .trim()
  .isLength({ min: 1, max: 64 })
  .withMessage('userId must be 1-64 characters');

export const getBalanceValidation = [userIdParam];

export const getHistoryValidation = [
  userIdParam,
  query('limit')
    .optional()
    .isInt({ min: 1, max: MAX_HISTORY_LIMIT })
    .withMessage(`limit must be between 1 and ${MAX_HISTORY_LIMIT}`),
];

export const manualGrantValidation = [
  userIdParam,
  body('amount')
    .isInt({ min: 1, max: MAX_MANUAL_GRANT })
    .withMessage(`amount must be an integer between 1 and ${MAX_MANUAL_GRANT}`)
    .toInt(),
  body('referenceId')
    .isString()
    .withMessage('referenceId is required')
    .trim()
    .matches(/^[A-Za-z0-9_.:-]{1,128}$/)
    .withMessage('referenceId must be 1-128 characters of letters, digits, _ . : or -'),
];
