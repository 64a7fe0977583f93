import { Request } from 'express';

/**
 * Internal callers of the API. Bot is the chat front-end, worker is the
 * generation worker pool, admin is operator tooling.
 */
export type ServiceRole = 'bot' | 'worker' | 'admin';

export const SERVICE_ROLES: readonly ServiceRole[] = ['bot', 'worker', 'admin'];

export interface ServiceTokenPayload {
  service: ServiceRole;
  iat?: number;
  exp?: number;
}

export interface ServiceRequest extends Request {
  service?: ServiceRole;
}
