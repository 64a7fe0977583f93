import jwt from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { SERVICE_ROLES, ServiceRole, ServiceTokenPayload } from './auth.types';

const isServiceRole = (value: unknown): value is ServiceRole =>
  typeof value === 'string' && SERVICE_ROLES.some((role) => role === value);

export class AuthService {
  constructor(
    private readonly secret: string = config.serviceAuth.secret,
    private readonly expiresInSeconds: number = config.serviceAuth.tokenExpiresIn
  ) {}

  issueToken(service: ServiceRole): string {
    const payload: ServiceTokenPayload = { service };
    return jwt.sign(payload, this.secret, { expiresIn: this.expiresInSeconds });
  }

  verifyToken(token: string): ServiceTokenPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || !isServiceRole(decoded.service)) {
      throw ApiError.invalidToken('Token does not identify a known service');
    }

    return { service: decoded.service, iat: decoded.iat, exp: decoded.exp };
  }
}

export const authService = new AuthService();
