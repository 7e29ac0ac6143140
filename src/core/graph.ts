/**
 * Microsoft Graph API Client
 * Typed calls for the resources the runbooks touch, all routed through the
 * resilient executor
 */

import type { DeviceCategory, DirectoryUser, ManagedDevice, RetryPolicy } from '../types';
import { GRAPH_API } from '../utils/constants';
import { logger } from '../utils/logger';
import { InvalidResourceError } from './errors';
import { ItemDecoder, PagedCollector, PagedCollectorOptions } from './pager';
import { ResilientRequestExecutor, ExecutorOptions } from './request';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const optionalString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value : undefined;

const requireString = (record: Record<string, unknown>, field: string, resource: string): string => {
  const value = optionalString(record[field]);
  if (value == null) {
    throw new InvalidResourceError(`Invalid ${resource}: missing ${field}`);
  }
  return value;
};

const requireRecord = (raw: unknown, resource: string): Record<string, unknown> => {
  if (!isRecord(raw)) {
    throw new InvalidResourceError(`Invalid ${resource}: expected an object`);
  }
  return raw;
};

export const toManagedDevice: ItemDecoder<ManagedDevice> = (raw) => {
  const record = requireRecord(raw, 'managed device');
  return {
    id: requireString(record, 'id', 'managed device'),
    deviceName: optionalString(record.deviceName) ?? '',
    operatingSystem: optionalString(record.operatingSystem) ?? 'Unknown',
    lastSyncDateTime: optionalString(record.lastSyncDateTime),
    userPrincipalName: optionalString(record.userPrincipalName),
    emailAddress: optionalString(record.emailAddress),
    deviceCategoryDisplayName: optionalString(record.deviceCategoryDisplayName),
  };
};

export const toDeviceCategory: ItemDecoder<DeviceCategory> = (raw) => {
  const record = requireRecord(raw, 'device category');
  return {
    id: requireString(record, 'id', 'device category'),
    displayName: requireString(record, 'displayName', 'device category'),
  };
};

export const toDirectoryUser: ItemDecoder<DirectoryUser> = (raw) => {
  const record = requireRecord(raw, 'user');
  return {
    id: requireString(record, 'id', 'user'),
    displayName: optionalString(record.displayName),
    userPrincipalName: optionalString(record.userPrincipalName),
    department: optionalString(record.department),
  };
};

export interface MailMessage {
  subject: string;
  body: string;
  to: string[];
}

export class GraphClient {
  constructor(
    private readonly executor: ResilientRequestExecutor,
    private readonly baseUrl: string = GRAPH_API.BASE_URL
  ) {}

  /**
   * Create a Graph client for an already-acquired token
   */
  static withToken(token: string, options: ExecutorOptions = {}, baseUrl?: string): GraphClient {
    return new GraphClient(new ResilientRequestExecutor(token, options), baseUrl);
  }

  /**
   * Resolve a path against the base URL; absolute URLs pass through.
   */
  url(pathOrUrl: string, baseUrl: string = this.baseUrl): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    const path = pathOrUrl.startsWith('/') ? pathOrUrl : `/${pathOrUrl}`;
    return `${baseUrl.replace(/\/$/, '')}${path}`;
  }

  /**
   * Fetch every page of a collection
   */
  async list<T>(
    path: string,
    decode: ItemDecoder<T>,
    options: PagedCollectorOptions & { policy?: Partial<RetryPolicy>; baseUrl?: string } = {}
  ): Promise<T[]> {
    const collector = new PagedCollector(this.executor, decode, options);
    return collector.collectAll(this.url(path, options.baseUrl), options.policy);
  }

  /**
   * List Intune managed devices
   */
  async listManagedDevices(select: readonly string[]): Promise<ManagedDevice[]> {
    const query = `$select=${select.join(',')}&$top=${GRAPH_API.PAGE_SIZE}`;
    const devices = await this.list(`/deviceManagement/managedDevices?${query}`, toManagedDevice);
    logger.debug(`Listed ${devices.length} managed devices`);
    return devices;
  }

  async listDeviceCategories(): Promise<DeviceCategory[]> {
    return this.list('/deviceManagement/deviceCategories', toDeviceCategory);
  }

  /**
   * Primary user of a managed device, or null when none is assigned
   */
  async getPrimaryUser(deviceId: string): Promise<DirectoryUser | null> {
    const users = await this.list(
      `/deviceManagement/managedDevices/${encodeURIComponent(deviceId)}/users?$select=id,displayName,userPrincipalName,department`,
      toDirectoryUser,
      { baseUrl: GRAPH_API.BETA_URL }
    );
    return users[0] ?? null;
  }

  /**
   * Assign a device category (beta-only reference endpoint)
   */
  async setDeviceCategory(deviceId: string, categoryId: string): Promise<void> {
    const base = GRAPH_API.BETA_URL;
    await this.executor.execute({
      method: 'PUT',
      uri: this.url(`/deviceManagement/managedDevices/${encodeURIComponent(deviceId)}/deviceCategory/$ref`, base),
      body: {
        '@odata.id': this.url(`/deviceManagement/deviceCategories/${encodeURIComponent(categoryId)}`, base),
      },
    });
  }

  /**
   * Send a plain-text mail as `sender`
   */
  async sendMail(sender: string, message: MailMessage): Promise<void> {
    await this.executor.execute({
      method: 'POST',
      uri: this.url(`/users/${encodeURIComponent(sender)}/sendMail`),
      body: {
        message: {
          subject: message.subject,
          body: { contentType: 'Text', content: message.body },
          toRecipients: message.to.map((address) => ({ emailAddress: { address } })),
        },
        saveToSentItems: false,
      },
    });
  }
}
