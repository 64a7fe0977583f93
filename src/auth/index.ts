export { authService, AuthService } from './auth.service';
export { requireService, userLogContext } from './auth.middleware';
export * from './auth.types';
