import { body } from 'express-validator';

import { TOPUP_PACKAGES } from '../../config/pricing';

const packageAmounts = TOPUP_PACKAGES.map((pkg) => pkg.rubAmount);

export const createTopupValidation = [
  body('userId')
    .isString()
    .withMessage('userId is required')
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('userId must be 1-64 characters'),
  body('rubAmount')
    .isInt({ min: 1 })
    .withMessage('rubAmount must be a positive integer')
    .bail()
    .toInt()
    .isIn(packageAmounts)
    .withMessage(`rubAmount must be one of: ${packageAmounts.join(', ')}`),
];
