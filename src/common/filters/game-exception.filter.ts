import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { GameError } from '../errors/game-errors.js';

export type ErrorBody = {
  code: string;
  message: string;
  details: unknown;
  path: string;
  campaignId: string | null;
};

export type ErrorReply = {
  status: number;
  body: ErrorBody;
};

type RequestInfo = {
  method: string;
  path: string;
  campaignId: string | null;
};

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const info: RequestInfo = {
      method: req.method,
      path: req.originalUrl,
      campaignId: req.params?.campaignId ?? null,
    };
    const reply = toErrorReply(exception, info);

    if (reply.status >= 500) {
      const cause = exception instanceof Error ? (exception.stack ?? exception.message) : String(exception);
      this.logger.error(`${info.method} ${info.path} → ${reply.body.code}: ${cause}`);
    } else {
      this.logger.warn(`${info.method} ${info.path} → ${reply.status} ${reply.body.code}`);
    }
    res.status(reply.status).json(reply.body);
  }
}

/** Maps anything thrown by a handler onto the API's error envelope. */
export function toErrorReply(exception: unknown, info: Pick<RequestInfo, 'path' | 'campaignId'>): ErrorReply {
  const where = { path: info.path, campaignId: info.campaignId };

  if (exception instanceof GameError) {
    return {
      status: exception.httpStatus,
      body: {
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
        ...where,
      },
    };
  }

  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    return {
      status: exception.getStatus(),
      body: {
        code: 'HTTP_ERROR',
        message: typeof body === 'string' ? body : exception.message,
        details: typeof body === 'object' ? body : null,
        ...where,
      },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
      ...where,
    },
  };
}
