import { Response, NextFunction, RequestHandler } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability/log-context';

import { AuthService, authService } from './auth.service';
import { ServiceRequest, ServiceRole } from './auth.types';

/**
 * Accept only bearer tokens issued to one of `roles`
 */
export const requireService = (
  roles: ServiceRole[],
  auth: AuthService = authService
): RequestHandler => {
  return (req: ServiceRequest, _res: Response, next: NextFunction): void => {
    try {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        throw ApiError.unauthorized('No authorization header provided');
      }

      if (!authHeader.startsWith('Bearer ')) {
        throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
      }

      const token = authHeader.substring(7);

      if (!token) {
        throw ApiError.unauthorized('No token provided');
      }

      const payload = auth.verifyToken(token);

      if (!roles.includes(payload.service)) {
        throw ApiError.forbidden(`Service '${payload.service}' may not call this endpoint`);
      }

      req.service = payload.service;
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * Attach the path's userId to the log context
 */
export const userLogContext = (req: ServiceRequest, _res: Response, next: NextFunction): void => {
  const userId = req.params.userId;
  if (userId) {
    addLogContext({ userId });
  }
  next();
};
