import type { DirectoryObjectKind } from '../models/directory-object.model';

/** The directory has no object with the requested id (or a stale reference points nowhere). */
export class DirectoryObjectNotFoundError extends Error {
  constructor(
    readonly objectKind: DirectoryObjectKind,
    readonly objectId: string,
  ) {
    super(`Directory ${objectKind} ${objectId} not found`);
    this.name = 'DirectoryObjectNotFoundError';
  }
}

/**
 * Any other failure talking to the directory: authentication, throttling,
 * server errors or the network. `status` is the upstream HTTP status, or
 * undefined when no response arrived.
 */
export class DirectoryRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DirectoryRequestError';
  }
}
