import type { Response } from 'express';
import { logger } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'OK',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Request failed',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    }
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
    };

    logger.warn(`[API Error] ${message}`, { statusCode, error });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid request data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  static conflict(res: Response, message: string = 'Already exists', details?: unknown): Response {
    return this.error(res, message, 409, {
      code: 'CONFLICT',
      details,
    });
  }

  static internalError(res: Response, message: string = 'Internal server error', error?: unknown): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return res.status(500).json({
      success: false,
      message,
      error: { code: 'INTERNAL_ERROR' },
    } satisfies ApiResponse);
  }

  static csv(res: Response, body: string, filename: string): Response {
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    return res.status(200).type('text/csv').send(body);
  }
}
