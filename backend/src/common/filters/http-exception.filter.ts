import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ApiError, ErrorCode } from '@event-hub/shared';

const CODE_BY_STATUS: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ErrorCode.VALIDATION_FAILED,
  [HttpStatus.UNAUTHORIZED]: ErrorCode.UNAUTHORIZED,
  [HttpStatus.FORBIDDEN]: ErrorCode.FORBIDDEN,
  [HttpStatus.NOT_FOUND]: ErrorCode.NOT_FOUND,
  [HttpStatus.CONFLICT]: ErrorCode.INVALID_TRANSITION,
  [HttpStatus.TOO_MANY_REQUESTS]: ErrorCode.TOO_MANY_REQUESTS,
};

/**
 * Serializes every error as an {@link ApiError}.
 *
 * Domain exceptions carry their own `code`; framework exceptions
 * (validation pipe, guards, throttler) get one derived from the status.
 * Anything that is not an HttpException is logged and reported as a 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toApiError(exception, request.originalUrl ?? request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${body.path} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    response.status(body.statusCode).json(body);
  }

  toApiError(exception: unknown, path: string): ApiError {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Internal server error',
        path,
        timestamp,
      };
    }

    const statusCode = exception.getStatus();
    const payload = exception.getResponse();
    const fields: Record<string, unknown> =
      typeof payload === 'object' && payload !== null
        ? Object.fromEntries(Object.entries(payload))
        : { message: payload };

    const code =
      Object.values(ErrorCode).find((candidate) => candidate === fields.code) ??
      CODE_BY_STATUS[statusCode] ??
      ErrorCode.INTERNAL_ERROR;

    const rawMessage = fields.message;
    if (Array.isArray(rawMessage)) {
      return {
        statusCode,
        code,
        message: 'Validation failed',
        details: rawMessage.map((entry) => String(entry)),
        path,
        timestamp,
      };
    }

    return {
      statusCode,
      code,
      message: typeof rawMessage === 'string' ? rawMessage : exception.message,
      path,
      timestamp,
    };
  }
}
