import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AuthException, RateLimitedException } from '../exceptions/auth.exception';

/**
 * Global filter. HttpExceptions keep their status and body; anything else is an
 * unexpected failure and is reported as a generic 500.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (exception instanceof RateLimitedException) {
      response.setHeader('Retry-After', String(exception.retryAfterSeconds));
    }

    if (exception instanceof AuthException && exception.isInfrastructureFailure) {
      this.logger.error(`${request.method} ${request.url} failed: ${exception.code}`);
    }

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).json(this.toBody(exception));
      return;
    }

    this.logger.error(
      `Unhandled error on ${request.method} ${request.url}`,
      exception instanceof Error ? exception.stack : String(exception),
    );

    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred.',
    });
  }

  private toBody(exception: HttpException): Record<string, unknown> {
    const body = exception.getResponse();

    if (typeof body === 'string') {
      return { statusCode: exception.getStatus(), message: body };
    }

    return { ...body };
  }
}
