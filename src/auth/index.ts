export { authService, AuthService } from './auth.service';
export { authMiddleware, requirePrincipal } from './auth.middleware';
export type { AuthRequest, JWTPayload } from './auth.types';
