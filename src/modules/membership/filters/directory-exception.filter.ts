import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { STATUS_CODES } from 'node:http';
import type { Response } from 'express';

import {
  DirectoryObjectNotFoundError,
  DirectoryRequestError,
} from '../../../domain/directory/directory-errors';
import { AppLogger } from '../../logging/app-logger.service';
import { LogCategory } from '../../logging/log-levels';

/** JSON error body returned for every failed request. `status` is the HTTP code as a string. */
export interface ErrorEnvelope {
  status: string;
  error: string;
  detail: string;
}

function detailFromHttpException(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const message = body.message;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

/**
 * Global exception filter.
 *
 * - HttpException: its own status and message
 * - DirectoryRequestError: 502, the directory could not be queried
 * - DirectoryObjectNotFoundError: 502; by the time one escapes the resolver
 *   the root group was found, so a vanished member is an upstream inconsistency
 * - anything else: 500 with a generic detail
 */
@Catch()
export class DirectoryExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: AppLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, detail } = this.classify(exception);

    const body: ErrorEnvelope = {
      status: String(status),
      error: STATUS_CODES[status] ?? 'Error',
      detail,
    };

    response.status(status).setHeader('Content-Type', 'application/json; charset=utf-8').json(body);
  }

  private classify(exception: unknown): { status: number; detail: string } {
    if (exception instanceof HttpException) {
      return { status: exception.getStatus(), detail: detailFromHttpException(exception) };
    }

    if (exception instanceof DirectoryRequestError) {
      this.logger.error(LogCategory.DIRECTORY, 'Directory request failed', exception, {
        upstreamStatus: exception.status,
      });
      return { status: HttpStatus.BAD_GATEWAY, detail: `Directory request failed: ${exception.message}` };
    }

    if (exception instanceof DirectoryObjectNotFoundError) {
      this.logger.error(LogCategory.MEMBERSHIP, 'Member lookup failed during resolution', exception, {
        kind: exception.objectKind,
        id: exception.objectId,
      });
      return { status: HttpStatus.BAD_GATEWAY, detail: `${exception.message} while resolving membership` };
    }

    this.logger.error(LogCategory.GENERAL, 'Unhandled exception', exception);
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, detail: 'Internal server error' };
  }
}
