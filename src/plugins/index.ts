// ============================================
// MELIAPP - Plugins Barrel Export
// ============================================

export { corsPlugin } from './cors.plugin.js';
export {
  errorHandlerPlugin,
  AppError,
  NotFoundError,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
  ConflictError,
  ServiceUnavailableError,
} from './error-handler.plugin.js';
export {
  authPlugin,
  verifyToken,
  blacklistToken,
  isTokenBlacklisted,
  extractBearerToken,
  requireUser,
  type AuthenticatedUser,
} from './auth.plugin.js';
