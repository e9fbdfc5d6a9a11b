import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import * as crypto from 'node:crypto';

import { IS_PUBLIC_KEY } from './public.decorator';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

const BEARER_PREFIX = 'Bearer ';

/** Constant-time comparison that does not leak the expected length through early exit. */
export function tokensMatch(presented: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(presented).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(
    private readonly configService: ConfigService,
    private readonly reflector: Reflector,
    private readonly logger: AppLogger,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (isPublic) {
      this.logger.trace(LogCategory.AUTH, 'Skipping auth – route is public');
      return true;
    }

    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();

    const expectedToken = this.expectedToken(response);
    const header = request.headers.authorization;

    if (!header || !header.startsWith(BEARER_PREFIX)) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header');
      this.reject(response, 'Missing bearer token.');
    }

    const token = header.slice(BEARER_PREFIX.length);
    if (!tokensMatch(token, expectedToken)) {
      this.logger.warn(LogCategory.AUTH, 'Authentication failed – invalid bearer token');
      this.reject(response, 'Invalid bearer token.');
    }

    this.logger.debug(LogCategory.AUTH, 'Bearer token accepted');
    return true;
  }

  /**
   * ADMIN_API_TOKEN from configuration. Missing in production is fatal; elsewhere an
   * ephemeral token is generated once per process and stored back into the environment.
   */
  private expectedToken(response: Response): string {
    const configured = this.configService.get<string>('ADMIN_API_TOKEN');
    if (configured) return configured;

    if (process.env.NODE_ENV === 'production') {
      this.logger.fatal(
        LogCategory.AUTH,
        'ADMIN_API_TOKEN is not configured. Set the environment variable or secret in your deployment.',
      );
      this.reject(response, 'Admin API token not configured.');
    }

    const generated = crypto.randomBytes(32).toString('base64url');
    process.env.ADMIN_API_TOKEN = generated;
    this.logger.warn(LogCategory.AUTH, `Auto-generated ephemeral ADMIN_API_TOKEN for ${process.env.NODE_ENV || 'development'}`, {
      hint: 'Set ADMIN_API_TOKEN env var to suppress this warning',
    });
    return generated;
  }

  private reject(response: Response, detail: string): never {
    response.setHeader('WWW-Authenticate', 'Bearer realm="group-membership"');
    throw new UnauthorizedException(detail);
  }
}
