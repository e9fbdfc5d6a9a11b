/**
 * GraphDirectoryClient — IDirectoryServiceClient over Microsoft Graph v1.0.
 *
 * Bearer tokens come from an `@azure/identity` TokenCredential (a
 * ClientSecretCredential in production), which caches and refreshes them.
 * Listing endpoints follow `@odata.nextLink` until the last page. Member and
 * owner references are typed from `@odata.type`; references of any other
 * type (org contacts, applications) are dropped.
 */
import { AuthenticationError, type AccessToken, type TokenCredential } from '@azure/identity';

import type { IDirectoryServiceClient } from '../../../domain/directory/directory-service.client.interface';
import {
  DirectoryObjectNotFoundError,
  DirectoryRequestError,
} from '../../../domain/directory/directory-errors';
import type {
  DeviceProfile,
  DirectoryObjectKind,
  DirectoryObjectRef,
  GroupProfile,
  ServicePrincipalProfile,
  UserProfile,
} from '../../../domain/models/directory-object.model';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';
import { isValidObjectId } from './object-id.guard';

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
const PAGE_SIZE = 999;

const ODATA_TYPE_TO_KIND: Record<string, DirectoryObjectKind> = {
  '#microsoft.graph.user': 'user',
  '#microsoft.graph.device': 'device',
  '#microsoft.graph.servicePrincipal': 'servicePrincipal',
  '#microsoft.graph.group': 'group',
};

export interface GraphDirectoryClientOptions {
  /** Default: https://graph.microsoft.com/v1.0 */
  baseUrl?: string;
}

type JsonObject = Record<string, unknown>;

interface NotFoundTarget {
  kind: DirectoryObjectKind;
  id: string;
}

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const ensureArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const stringField = (obj: JsonObject, key: string): string => {
  const value = obj[key];
  return typeof value === 'string' ? value : '';
};

/** Graph wraps failures as `{ error: { code, message } }`. */
function graphErrorMessage(raw: unknown, fallback: string): string {
  if (!isObject(raw)) return fallback;
  const error = raw['error'];
  const message = isObject(error) ? error['message'] : undefined;
  return typeof message === 'string' && message ? message : fallback;
}

export class GraphDirectoryClient implements IDirectoryServiceClient {
  private readonly baseUrl: string;
  private readonly scope: string;

  constructor(
    options: GraphDirectoryClientOptions,
    private readonly credential: TokenCredential,
    private readonly logger: AppLogger,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, '');
    this.scope = `${new URL(this.baseUrl).origin}/.default`;
  }

  async getGroupByName(name: string): Promise<GroupProfile | null> {
    const filter = `displayName eq '${name.replace(/'/g, "''")}'`;
    const url = `${this.baseUrl}/groups?$filter=${encodeURIComponent(filter)}&$select=id,displayName`;
    const body = await this.getJson(url);
    const matches = ensureArray(body['value']).filter(isObject);
    const [first] = matches;
    if (!first) {
      this.logger.debug(LogCategory.DIRECTORY, 'No group with display name', { name });
      return null;
    }
    if (matches.length > 1) {
      this.logger.warn(LogCategory.DIRECTORY, 'Several groups share the display name; using the first', {
        name,
        matches: matches.length,
        chosenId: stringField(first, 'id'),
      });
    }
    return { id: stringField(first, 'id'), displayName: stringField(first, 'displayName') };
  }

  async getGroupMembers(groupId: string): Promise<DirectoryObjectRef[]> {
    this.assertObjectId('group', groupId);
    return this.listReferences(
      `${this.baseUrl}/groups/${groupId}/members?$select=id&$top=${PAGE_SIZE}`,
      { kind: 'group', id: groupId },
    );
  }

  async getUser(userId: string): Promise<UserProfile> {
    this.assertObjectId('user', userId);
    const body = await this.getJson(
      `${this.baseUrl}/users/${userId}?$select=id,displayName,userPrincipalName`,
      { kind: 'user', id: userId },
    );
    return {
      id: stringField(body, 'id') || userId,
      displayName: stringField(body, 'displayName'),
      userPrincipalName: stringField(body, 'userPrincipalName'),
    };
  }

  async getDevice(deviceId: string): Promise<DeviceProfile> {
    this.assertObjectId('device', deviceId);
    const body = await this.getJson(
      `${this.baseUrl}/devices/${deviceId}?$select=id,displayName`,
      { kind: 'device', id: deviceId },
    );
    return { id: stringField(body, 'id') || deviceId, displayName: stringField(body, 'displayName') };
  }

  async getServicePrincipal(servicePrincipalId: string): Promise<ServicePrincipalProfile> {
    this.assertObjectId('servicePrincipal', servicePrincipalId);
    const body = await this.getJson(
      `${this.baseUrl}/servicePrincipals/${servicePrincipalId}?$select=id,displayName`,
      { kind: 'servicePrincipal', id: servicePrincipalId },
    );
    return {
      id: stringField(body, 'id') || servicePrincipalId,
      displayName: stringField(body, 'displayName'),
    };
  }

  async getDeviceRegisteredOwners(deviceId: string): Promise<DirectoryObjectRef[]> {
    this.assertObjectId('device', deviceId);
    return this.listReferences(
      `${this.baseUrl}/devices/${deviceId}/registeredOwners?$select=id&$top=${PAGE_SIZE}`,
      { kind: 'device', id: deviceId },
    );
  }

  async getGroup(groupId: string): Promise<GroupProfile> {
    this.assertObjectId('group', groupId);
    const body = await this.getJson(
      `${this.baseUrl}/groups/${groupId}?$select=id,displayName`,
      { kind: 'group', id: groupId },
    );
    return { id: stringField(body, 'id') || groupId, displayName: stringField(body, 'displayName') };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private assertObjectId(kind: DirectoryObjectKind, id: string): void {
    if (!isValidObjectId(id)) {
      this.logger.debug(LogCategory.DIRECTORY, 'Rejected malformed object id', { kind, id });
      throw new DirectoryObjectNotFoundError(kind, id);
    }
  }

  private async listReferences(firstUrl: string, owner: NotFoundTarget): Promise<DirectoryObjectRef[]> {
    const refs: DirectoryObjectRef[] = [];
    let url: string | null = firstUrl;
    let pages = 0;
    let dropped = 0;

    while (url) {
      const body = await this.getJson(url, owner);
      pages++;
      for (const entry of ensureArray(body['value'])) {
        const ref = this.toReference(entry);
        if (ref) {
          refs.push(ref);
        } else {
          dropped++;
        }
      }
      const next = body['@odata.nextLink'];
      url = typeof next === 'string' && next ? next : null;
    }

    this.logger.debug(LogCategory.DIRECTORY, `Listed ${owner.kind} references`, {
      id: owner.id,
      count: refs.length,
      dropped,
      pages,
    });
    return refs;
  }

  private toReference(entry: unknown): DirectoryObjectRef | null {
    if (!isObject(entry)) return null;
    const id = stringField(entry, 'id');
    const kind = ODATA_TYPE_TO_KIND[stringField(entry, '@odata.type')];
    if (!id || kind === undefined) {
      this.logger.trace(LogCategory.DIRECTORY, 'Dropped unsupported directory reference', {
        id,
        odataType: entry['@odata.type'],
      });
      return null;
    }
    return { id, kind };
  }

  private async getJson(url: string, notFound?: NotFoundTarget): Promise<JsonObject> {
    const accessToken = await this.getAccessToken();
    this.logger.trace(LogCategory.DIRECTORY, 'GET', { url });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
        },
      });
    } catch (err) {
      throw new DirectoryRequestError(
        `Graph request failed: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        { cause: err },
      );
    }

    const raw: unknown = await response.json().catch(() => ({}));

    if (response.status === 404 && notFound) {
      throw new DirectoryObjectNotFoundError(notFound.kind, notFound.id);
    }
    if (!response.ok) {
      throw new DirectoryRequestError(
        graphErrorMessage(raw, `Graph request failed with HTTP ${response.status}`),
        response.status,
      );
    }
    if (!isObject(raw)) {
      throw new DirectoryRequestError('Graph returned an unexpected response body', response.status);
    }
    return raw;
  }

  private async getAccessToken(): Promise<string> {
    let accessToken: AccessToken | null;
    try {
      accessToken = await this.credential.getToken(this.scope);
    } catch (err) {
      this.logger.error(LogCategory.DIRECTORY, 'Token request rejected', err, { scope: this.scope });
      throw new DirectoryRequestError(
        `Token request failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof AuthenticationError ? err.statusCode : undefined,
        { cause: err },
      );
    }
    if (!accessToken) {
      throw new DirectoryRequestError(`No access token issued for ${this.scope}`);
    }
    return accessToken.token;
  }
}
