import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { AppLogger } from './app-logger.service';
import { LogCategory } from './log-levels';

const SLOW_REQUEST_MS = 2000;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: AppLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    // Generate or propagate correlation request ID
    const header = request.headers['x-request-id'];
    const requestId = typeof header === 'string' && header ? header : randomUUID();
    response.setHeader('X-Request-Id', requestId);

    // Run the entire request pipeline within a correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext(
        {
          requestId,
          method: request.method,
          path: url,
          startTime: startedAt,
        },
        () => {
          this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: request.headers['user-agent'],
            ip: request.ip ?? request.socket?.remoteAddress,
          });

          next.handle().pipe(
            tap(() => {
              const durationMs = Date.now() - startedAt;

              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                status: response.statusCode,
                durationMs,
              });

              // Transitive expansion of large groups can be slow; surface it
              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
                  status: response.statusCode,
                  durationMs,
                });
              }
            }),
            catchError((error: unknown) => {
              const status = error instanceof HttpException ? error.getStatus() : 500;
              const summary = `← ${status} ${request.method} ${url}`;
              const data = { status, durationMs: Date.now() - startedAt };
              // Client mistakes (bad token, unknown group) are not service failures
              if (status < 500) {
                this.logger.warn(LogCategory.HTTP, summary, { ...data, reason: errorMessage(error) });
              } else {
                this.logger.error(LogCategory.HTTP, summary, error, data);
              }
              throw error;
            })
          ).subscribe(subscriber);
        }
      );
    });
  }
}
