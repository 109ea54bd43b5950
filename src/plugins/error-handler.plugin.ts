// ============================================
// MELIAPP - Error Handler Plugin
// ============================================

import { FastifyPluginAsync, FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { isDevelopment } from '../config/env.js';
import type { ApiFailure } from '../types/index.js';

// Custom error classes
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 404, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'No autorizado') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Acceso denegado') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

// Identity provider or database unreachable
export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Servicio no disponible, intenta nuevamente') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

function hasClientStatus(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error
    && typeof error.statusCode === 'number'
    && error.statusCode >= 400
    && error.statusCode < 500;
}

const errorHandlerPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Global error handler
  fastify.setErrorHandler((error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiFailure = {
      success: false,
      code: 'INTERNAL_ERROR',
      message: 'Error interno del servidor',
    };

    let statusCode = 500;

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      statusCode = 400;
      response.code = 'VALIDATION_ERROR';
      response.message = error.issues[0]?.message ?? 'Datos inválidos';
      response.details = error.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));
    }
    // Handle our custom errors
    else if (error instanceof AppError) {
      statusCode = error.statusCode;
      response.code = error.code;
      response.message = error.message;
      if (error.details !== undefined) {
        response.details = error.details;
      }
    }
    // Handle Fastify validation errors (malformed JSON bodies, etc.)
    else if ('validation' in error && error.validation) {
      statusCode = 400;
      response.code = 'VALIDATION_ERROR';
      response.message = 'Solicitud inválida';
      response.details = error.validation;
    }
    // Client errors raised by fastify itself (unsupported media type, body too large)
    else if (hasClientStatus(error)) {
      statusCode = error.statusCode;
      response.code = 'BAD_REQUEST';
      response.message = error.message;
    }
    // Handle other errors
    else if (isDevelopment()) {
      response.message = error.message || response.message;
    }

    // Include stack trace in development
    if (isDevelopment() && error.stack) {
      response.stack = error.stack;
    }

    const logPayload = {
      err: error,
      request: {
        method: request.method,
        url: request.url,
        params: request.params,
        query: request.query,
      },
    };
    if (statusCode >= 500) {
      request.log.error(logPayload);
    } else {
      request.log.warn(logPayload);
    }

    reply.status(statusCode).send(response);
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    const response: ApiFailure = {
      success: false,
      code: 'NOT_FOUND',
      message: `Ruta ${request.method} ${request.url} no encontrada`,
    };
    reply.status(404).send(response);
  });
};

// Not encapsulated: the handlers must apply to every controller
export const errorHandlerPlugin = fp(errorHandlerPluginImpl, {
  name: 'meliapp-error-handler',
});
