import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { Public } from '../../auth/public.decorator';

export interface HealthInfo {
  status: 'ok';
  version: string;
  directoryBackend: string;
  uptimeSeconds: number;
  runtime: {
    node: string;
    platform: string;
  };
}

@Controller('health')
export class HealthController {
  constructor(private readonly config: ConfigService) {}

  @Public()
  @Get()
  getHealth(): HealthInfo {
    return {
      status: 'ok',
      version: this.config.get<string>('APP_VERSION') ?? '0.0.0',
      directoryBackend: this.config.get<string>('DIRECTORY_BACKEND') ?? 'graph',
      uptimeSeconds: Math.floor(process.uptime()),
      runtime: {
        node: process.version,
        platform: `${process.platform}-${process.arch}`,
      },
    };
  }
}
