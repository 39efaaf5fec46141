import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponseDto } from '../dto/error-response.dto';

/**
 * HTTP Exception Filter
 *
 * Catches every exception and answers with the same error shape the health
 * endpoints use:
 * {
 *   "status": "error",
 *   "httpStatus": 404,
 *   "timestamp": "...",
 *   "path": "/api/health/unknown",
 *   "error": "..."
 * }
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'An unexpected error occurred';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = this.extractMessage(exception);
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${message}`, exception.stack);
    }

    const sanitizedMessage = this.sanitizeMessage(message, status);

    const errorResponse: ErrorResponseDto = {
      status: 'error',
      httpStatus: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      error: sanitizedMessage,
    };

    this.logger.warn(`HTTP ${status} ${request.method} ${request.url}: ${sanitizedMessage}`);

    response.status(status).json(errorResponse);
  }

  private extractMessage(exception: HttpException): string {
    const exceptionResponse = exception.getResponse();

    if (typeof exceptionResponse === 'string') {
      return exceptionResponse;
    }

    if (typeof exceptionResponse === 'object' && exceptionResponse !== null && 'message' in exceptionResponse) {
      const { message } = exceptionResponse;
      if (Array.isArray(message)) {
        return message.join('; ');
      }
      if (typeof message === 'string' && message.length > 0) {
        return message;
      }
    }

    return exception.message;
  }

  private sanitizeMessage(message: string, status: number): string {
    // Internal details stay in the logs in production
    if (
      process.env.NODE_ENV === 'production' &&
      status === HttpStatus.INTERNAL_SERVER_ERROR
    ) {
      return 'An internal server error occurred. Please try again later.';
    }

    // Remove stack frames and source paths
    return message
      .replace(/at .+\(.+\)/g, '')
      .replace(/\/[a-zA-Z0-9_\-\/]+\.ts:\d+:\d+/g, '')
      .trim();
  }
}
