/**
 * DirectoryClientModule — dynamic module that provides IDirectoryServiceClient.
 *
 * Selects the directory backend via the DIRECTORY_BACKEND environment variable:
 *   - "graph"    (default) → GraphDirectoryClient with a ClientSecretCredential
 *                            (GRAPH_TENANT_ID, GRAPH_CLIENT_ID, GRAPH_CLIENT_SECRET, GRAPH_AUTHORITY_URL)
 *   - "inmemory"           → InMemoryDirectoryClient, seeded from DIRECTORY_SEED_FILE when set
 *
 * Usage:
 *   imports: [DirectoryClientModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClientSecretCredential } from '@azure/identity';

import { DIRECTORY_SERVICE_CLIENT } from '../../domain/directory/directory.tokens';
import { AppLogger } from '../../modules/logging/app-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';
import { GraphDirectoryClient } from './graph/graph-directory.client';
import { loadDirectorySnapshot } from './inmemory/directory-snapshot';
import { InMemoryDirectoryClient } from './inmemory/inmemory-directory.client';

export const DIRECTORY_BACKENDS = ['graph', 'inmemory'] as const;
export type DirectoryBackend = typeof DIRECTORY_BACKENDS[number];

export function resolveDirectoryBackend(raw: string | undefined): DirectoryBackend {
  const normalized = (raw ?? 'graph').trim().toLowerCase();
  const backend = DIRECTORY_BACKENDS.find((b) => b === normalized);
  if (!backend) {
    throw new Error(`DIRECTORY_BACKEND must be one of ${DIRECTORY_BACKENDS.join(', ')} (got '${raw}')`);
  }
  return backend;
}

function requireSetting(config: ConfigService, key: string): string {
  const value = config.get<string>(key);
  if (!value) {
    throw new Error(`${key} must be set when DIRECTORY_BACKEND is graph`);
  }
  return value;
}

export function createGraphDirectoryClient(config: ConfigService, logger: AppLogger): GraphDirectoryClient {
  const tenantId = requireSetting(config, 'GRAPH_TENANT_ID');
  const authorityHost = config.get<string>('GRAPH_AUTHORITY_URL');
  const credential = new ClientSecretCredential(
    tenantId,
    requireSetting(config, 'GRAPH_CLIENT_ID'),
    requireSetting(config, 'GRAPH_CLIENT_SECRET'),
    authorityHost ? { authorityHost } : {},
  );
  const client = new GraphDirectoryClient({ baseUrl: config.get<string>('GRAPH_BASE_URL') }, credential, logger);
  logger.info(LogCategory.DIRECTORY, 'Using Microsoft Graph directory backend', { tenantId });
  return client;
}

export function createInMemoryDirectoryClient(config: ConfigService, logger: AppLogger): InMemoryDirectoryClient {
  const client = new InMemoryDirectoryClient();
  const seedFile = config.get<string>('DIRECTORY_SEED_FILE');
  if (seedFile) {
    const snapshot = loadDirectorySnapshot(seedFile);
    client.load(snapshot);
    logger.info(LogCategory.DIRECTORY, 'Seeded in-memory directory', {
      seedFile,
      users: snapshot.users.length,
      devices: snapshot.devices.length,
      servicePrincipals: snapshot.servicePrincipals.length,
      groups: snapshot.groups.length,
    });
  } else {
    logger.warn(LogCategory.DIRECTORY, 'In-memory directory started empty', {
      hint: 'Set DIRECTORY_SEED_FILE to load a snapshot',
    });
  }
  return client;
}

@Module({})
export class DirectoryClientModule {
  static register(): DynamicModule {
    const backend = resolveDirectoryBackend(process.env.DIRECTORY_BACKEND);

    if (backend === 'inmemory') {
      return {
        module: DirectoryClientModule,
        global: true,
        providers: [
          {
            provide: DIRECTORY_SERVICE_CLIENT,
            useFactory: createInMemoryDirectoryClient,
            inject: [ConfigService, AppLogger],
          },
        ],
        exports: [DIRECTORY_SERVICE_CLIENT],
      };
    }

    // Default: Microsoft Graph
    return {
      module: DirectoryClientModule,
      global: true,
      providers: [
        {
          provide: DIRECTORY_SERVICE_CLIENT,
          useFactory: createGraphDirectoryClient,
          inject: [ConfigService, AppLogger],
        },
      ],
      exports: [DIRECTORY_SERVICE_CLIENT],
    };
  }
}
