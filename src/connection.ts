/**
 * Connection Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - connection.resolve
 *
 * Turns raw host/credential settings into a GitlabConnection.
 * Fails before any network call when either is missing.
 */

import type { GitlabConnection } from './types';
import { DEFAULT_CONNECTION_TIMEOUT_SECONDS } from './types';
import { ConfigurationError } from './errors';

export interface ConnectionSettings {
  host: string | undefined;
  token: string | undefined;
  timeout_seconds?: number;
}

/**
 * @throws ConfigurationError if the token or host is missing
 */
export function resolveConnection(settings: ConnectionSettings): GitlabConnection {
  const token = settings.token?.trim();
  const host = settings.host?.trim();

  if (!token) {
    throw new ConfigurationError('An access token is required to authenticate to GitLab.');
  }
  if (!host) {
    throw new ConfigurationError('Host is required to connect to GitLab.');
  }

  return {
    host,
    token,
    timeout_seconds: settings.timeout_seconds ?? DEFAULT_CONNECTION_TIMEOUT_SECONDS,
  };
}
