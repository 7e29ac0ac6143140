/**
 * Managed Identity Authentication
 * Acquires resource-scoped bearer tokens for the run's identity
 */

import {
  AuthenticationResult,
  LogLevel,
  ManagedIdentityApplication,
  ManagedIdentityConfiguration,
} from '@azure/msal-node';
import type { ResourceAudience, TokenProvider } from '../types';
import { RESOURCE_AUDIENCES } from '../utils/constants';
import { logger } from '../utils/logger';
import { AuthenticationError, toErrorMessage } from './errors';

/**
 * Reduce whatever the identity layer handed back to a plain bearer string.
 */
export function normalizeToken(raw: unknown): string {
  let token: string | undefined;

  if (typeof raw === 'string') {
    token = raw;
  } else if (Buffer.isBuffer(raw)) {
    token = raw.toString('utf8');
  } else if (typeof raw === 'object' && raw !== null) {
    if ('accessToken' in raw && typeof raw.accessToken === 'string') {
      token = raw.accessToken;
    } else if ('token' in raw && typeof raw.token === 'string') {
      token = raw.token;
    }
  }

  const trimmed = token?.trim();
  if (!trimmed) {
    throw new AuthenticationError('Identity returned an empty access token');
  }
  return trimmed;
}

export class ManagedIdentityTokenProvider implements TokenProvider {
  private client?: ManagedIdentityApplication;

  /**
   * @param clientId - client id of a user-assigned identity; omit for system-assigned
   */
  constructor(private readonly clientId?: string) {}

  private getClient(): ManagedIdentityApplication {
    if (this.client) return this.client;

    const config: ManagedIdentityConfiguration = {
      system: {
        loggerOptions: {
          loggerCallback: (level, message) => {
            if (level <= LogLevel.Warning) {
              logger.debug(`MSAL: ${message}`);
            }
          },
          piiLoggingEnabled: false,
          logLevel: LogLevel.Warning,
        },
      },
    };
    if (this.clientId) {
      config.managedIdentityIdParams = { userAssignedClientId: this.clientId };
    }

    this.client = new ManagedIdentityApplication(config);
    return this.client;
  }

  async acquireToken(audience: ResourceAudience): Promise<string> {
    const resource = RESOURCE_AUDIENCES[audience];
    logger.debug(`Acquiring managed identity token for ${audience}`);

    let result: AuthenticationResult;
    try {
      result = await this.getClient().acquireToken({ resource });
    } catch (error) {
      logger.error(`Failed to acquire token for ${audience}: ${toErrorMessage(error)}`);
      throw new AuthenticationError(`Authentication failed for ${audience}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    const token = normalizeToken(result);
    logger.info(`Acquired access token for ${audience}`, { expiresOn: result.expiresOn?.toISOString() ?? null });
    return token;
  }
}

/**
 * Acquire one token per distinct audience, up front, for the whole run.
 */
export async function acquireRunTokens(
  provider: TokenProvider,
  audiences: readonly ResourceAudience[]
): Promise<Map<ResourceAudience, string>> {
  const tokens = new Map<ResourceAudience, string>();

  for (const audience of audiences) {
    if (tokens.has(audience)) continue;

    let raw: unknown;
    try {
      raw = await provider.acquireToken(audience);
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      throw new AuthenticationError(`Authentication failed for ${audience}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    tokens.set(audience, normalizeToken(raw));
  }

  return tokens;
}
