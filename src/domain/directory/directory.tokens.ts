/**
 * NestJS injection tokens for the directory port.
 *
 * Usage:
 *   @Inject(DIRECTORY_SERVICE_CLIENT) private readonly directory: IDirectoryServiceClient
 */
export const DIRECTORY_SERVICE_CLIENT = 'DIRECTORY_SERVICE_CLIENT';
