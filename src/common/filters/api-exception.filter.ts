import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ZodError } from 'zod';
import { RedirectException } from '../../modules/authorization/redirect.exception';

type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
    location?: string;
  };
};

export type RequestWithId = Request & { requestId?: string };

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

function requestIdOf(req: RequestWithId | undefined): string | undefined {
  if (req?.requestId) return req.requestId;
  const header = req?.headers?.['x-request-id'];
  return typeof header === 'string' && header ? header : undefined;
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const requestId = requestIdOf(ctx.getRequest<RequestWithId | undefined>());
    const send = (status: number, payload: ErrorEnvelope) =>
      res.status(status).json(requestId ? { meta: { ...payload.meta, requestId } } : payload);

    // Zod validation errors
    if (exception instanceof ZodError) {
      const errors: ApiError[] = exception.issues.map((i) => ({
        code: HttpStatus.BAD_REQUEST,
        message: i.message,
        reason: i.path.length ? i.path.join('.') : 'validation',
      }));
      return send(HttpStatus.BAD_REQUEST, {
        meta: {
          status: HttpStatus.BAD_REQUEST,
          errors: errors.length ? errors : [{ code: 400, message: 'Invalid request', reason: 'validation' }],
        },
      });
    }

    // Redirect-mode denials: browsers follow Location, API clients read meta.location.
    if (exception instanceof RedirectException) {
      const status = exception.getStatus();
      const { message, reason } = extractHttpMessage(exception);
      res.setHeader('Location', exception.location);
      return send(status, {
        meta: { status, errors: [{ code: status, message, reason }], location: exception.location },
      });
    }

    // Nest HTTP exceptions
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const { message, reason } = extractHttpMessage(exception);
      return send(status, { meta: { status, errors: [{ code: status, message, reason }] } });
    }

    // Unknown: still a safe envelope, with the underlying error in the log.
    this.logger.error(
      `Unhandled exception requestId=${requestId ?? '-'}`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    return send(HttpStatus.INTERNAL_SERVER_ERROR, {
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
    });
  }
}
