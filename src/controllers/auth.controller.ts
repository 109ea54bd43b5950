// ============================================
// MELIAPP - Auth Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { AuthService } from '../services/auth.service.js';
import { requireUser, verifyToken, type AuthenticatedUser } from '../plugins/auth.plugin.js';
import { UnauthorizedError } from '../plugins/error-handler.plugin.js';
import {
  registerSchema,
  loginSchema,
  emailOnlySchema,
  resetPasswordSchema,
  changePasswordSchema,
  oauthTokensSchema,
} from '../schemas/auth.schema.js';
import { toAccountJson, toSessionJson } from './serializers.js';

const RESET_REQUESTED_MESSAGE =
  'Si el correo está registrado, recibirás un enlace para recuperar tu contraseña.';

function verifyOAuthToken(token: string): AuthenticatedUser {
  try {
    return verifyToken(token);
  } catch (err) {
    throw new UnauthorizedError(
      err instanceof UnauthorizedError ? err.message : 'Token de acceso inválido'
    );
  }
}

export const authController: FastifyPluginAsync = async (fastify) => {
  const authService = new AuthService(fastify.db, fastify.identity, fastify.log);

  // Register
  fastify.post('/api/auth/register', async (request, reply) => {
    const body = registerSchema.parse(request.body);
    const result = await authService.register(body);

    reply.status(201);
    return {
      success: true,
      message: result.session
        ? 'Registro exitoso'
        : 'Registro exitoso. Revisa tu correo para confirmar la cuenta.',
      user: toAccountJson(result.account),
      session: result.session ? toSessionJson(result.session) : null,
    };
  });

  // Login
  fastify.post('/api/auth/login', async (request) => {
    const body = loginSchema.parse(request.body);
    const result = await authService.login(body.email, body.password);
    return {
      success: true,
      user: toAccountJson(result.account),
      session: toSessionJson(result.session),
      redirect_url: '/',
    };
  });

  // Logout
  fastify.post('/api/auth/logout', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    await authService.logout(requireUser(request));
    return { success: true, message: 'Sesión cerrada' };
  });

  // Session check, never fails for anonymous visitors
  fastify.get('/api/auth/session', {
    preHandler: fastify.optionalAuth,
  }, async (request) => {
    if (!request.user) {
      return { success: true, logged_in: false };
    }
    const account = await authService.getAccount(request.user.userId, request.user.email);
    return account
      ? { success: true, logged_in: true, user: toAccountJson(account) }
      : { success: true, logged_in: false };
  });

  fastify.get('/api/user/current', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const user = requireUser(request);
    const account = await authService.getAccount(user.userId, user.email);
    return {
      success: true,
      user_id: user.userId,
      user: account ? toAccountJson(account) : null,
    };
  });

  // Password recovery
  fastify.post('/api/auth/forgot-password', async (request) => {
    const body = emailOnlySchema.parse(request.body);
    await authService.requestPasswordReset(body.email);
    return { success: true, message: RESET_REQUESTED_MESSAGE };
  });

  fastify.post('/api/auth/reset-password', async (request) => {
    const body = resetPasswordSchema.parse(request.body);
    await authService.resetPassword(body.token, body.password);
    return { success: true, message: 'Contraseña actualizada correctamente' };
  });

  // Change password
  fastify.post('/api/auth/change-password', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const body = changePasswordSchema.parse(request.body);
    await authService.changePassword(requireUser(request), body.current_password, body.new_password);
    return { success: true, message: 'Contraseña actualizada correctamente' };
  });

  fastify.post('/api/auth/resend-confirmation', async (request) => {
    const body = emailOnlySchema.parse(request.body);
    await authService.resendConfirmation(body.email);
    return { success: true, message: 'Correo de confirmación reenviado' };
  });

  // Google OAuth - Initiate
  fastify.get('/api/auth/google', async (_request, reply) => {
    const url = await authService.getGoogleAuthUrl();
    return reply.redirect(url);
  });

  // Google OAuth - tokens read by the callback page from the URL fragment
  fastify.post('/api/auth/oauth/tokens', async (request) => {
    const body = oauthTokensSchema.parse(request.body);

    const account = await authService.completeOAuth(verifyOAuthToken(body.access_token));
    return {
      success: true,
      user: toAccountJson(account),
      redirect_url: `/profile/${account.id}`,
    };
  });
};
