import { body, header, param, query } from 'express-validator';

import { config } from '../../config';

import { MAX_LIST_LIMIT } from './generation.service';

const isScalarRecord = (value: unknown): boolean =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => ['string', 'number', 'boolean'].includes(typeof entry));

const jobIdParam = param('jobId')
  .matches(/^gen_[A-Za-z0-9_-]{1,80}$/)
  .withMessage('jobId must look like gen_<id>');

const userIdBody = body('userId')
  .isString()
  .withMessage('userId is required')
  .trim()
  .isLength({ min: 1, max: 64 })
  .withMessage('userId must be 1-64 characters');

export const createGenerationValidation = [
  userIdBody,
  body('prompt')
    .isString()
    .withMessage('prompt is required')
    .trim()
    .isLength({ min: 1, max: config.generation.maxPromptLength })
    .withMessage(`prompt must be 1-${config.generation.maxPromptLength} characters`),
  body('settings')
    .optional()
    .custom(isScalarRecord)
    .withMessage('settings must be an object of string, number or boolean values'),
  body('referenceImages')
    .optional()
    .isArray({ max: config.generation.maxReferenceImages })
    .withMessage(`referenceImages must be an array of at most ${config.generation.maxReferenceImages} URLs`),
  body('referenceImages.*').isURL().withMessage('Each reference image must be a URL'),
  header('x-idempotency-key')
    .optional()
    .matches(/^[A-Za-z0-9_-]{8,64}$/)
    .withMessage('X-Idempotency-Key must be 8-64 characters of letters, digits, _ or -'),
];

export const getGenerationValidation = [jobIdParam];

export const listUserGenerationsValidation = [
  param('userId')
    .isString()
    .trim()
    .isLength({ min: 1, max: 64 })
    .withMessage('userId must be 1-64 characters'),
  query('limit')
    .optional()
    .isInt({ min: 1, max: MAX_LIST_LIMIT })
    .withMessage(`limit must be between 1 and ${MAX_LIST_LIMIT}`),
];

export const cancelGenerationValidation = [jobIdParam, userIdBody];

export const markProcessingValidation = [jobIdParam];

export const completeGenerationValidation = [
  jobIdParam,
  body('imageUrl').isURL().withMessage('imageUrl must be a URL'),
  body('seed').optional().isInt().withMessage('seed must be an integer'),
  body('metadata').optional().isObject().withMessage('metadata must be an object'),
];

export const failGenerationValidation = [
  jobIdParam,
  body('error')
    .isString()
    .withMessage('error is required')
    .trim()
    .isLength({ min: 1, max: 500 })
    .withMessage('error must be 1-500 characters'),
];
