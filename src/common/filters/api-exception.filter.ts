import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';

export type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

export type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
  };
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

export function toErrorEnvelope(exception: unknown): ErrorEnvelope {
  if (exception instanceof ZodError) {
    const errors: ApiError[] = exception.issues.map((i) => ({
      code: HttpStatus.BAD_REQUEST,
      message: i.message,
      reason: i.path.length ? i.path.join('.') : 'validation',
    }));
    return {
      meta: {
        status: HttpStatus.BAD_REQUEST,
        errors: errors.length ? errors : [{ code: HttpStatus.BAD_REQUEST, message: 'Invalid request', reason: 'validation' }],
      },
    };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const { message, reason } = extractHttpMessage(exception);
    return { meta: { status, errors: [{ code: status, message, reason }] } };
  }

  return {
    meta: {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      errors: [
        {
          code: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Internal server error',
          reason: 'internal_error',
        },
      ],
    },
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const header = res.getHeader('x-request-id');
    const requestId = typeof header === 'string' && header ? header : null;

    const payload = toErrorEnvelope(exception);
    if (payload.meta.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      // The client only sees a generic envelope; keep the real error in the logs.
      const detail = exception instanceof Error ? exception.stack ?? exception.message : String(exception);
      this.logger.error(`Unhandled exception${requestId ? ` rid=${requestId}` : ''}`, detail);
    }

    const body: ErrorEnvelope = requestId ? { meta: { ...payload.meta, requestId } } : payload;
    return res.status(payload.meta.status).json(body);
  }
}
