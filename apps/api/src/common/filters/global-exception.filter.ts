import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { ReportError } from '../errors/report-errors';

export interface ErrorEnvelope {
  success: false;
  error: { code: string; message: string; details?: unknown };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const { status, body } = this.toEnvelope(exception);

    if (status >= 500) {
      this.logger.error(
        `[${body.error.code}] ${body.error.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    reply.status(status).send(body);
  }

  toEnvelope(exception: unknown): { status: number; body: ErrorEnvelope } {
    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'An unexpected error occurred';
    let details: unknown = undefined;

    if (exception instanceof ReportError) {
      status = exception.status;
      code = exception.code;
      message = exception.message;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const response = exception.getResponse();
      if (typeof response === 'string') {
        message = response;
      } else if (typeof response === 'object' && response !== null) {
        if ('message' in response && typeof response.message === 'string') message = response.message;
        if ('error' in response && typeof response.error === 'string') code = response.error;
        if ('details' in response) details = response.details;
      }
    } else if (exception instanceof ZodError) {
      status = HttpStatus.UNPROCESSABLE_ENTITY;
      code = 'VALIDATION_ERROR';
      message = 'Request validation failed';
      details = exception.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      }));
    } else if (exception instanceof Error) {
      message = exception.message;
    }

    return { status, body: { success: false, error: { code, message, details } } };
  }
}
