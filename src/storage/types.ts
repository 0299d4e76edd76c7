/**
 * Storage Types - session backend configuration
 */

export enum SessionBackendType {
  MEMORY = 'memory',
  REDIS = 'redis',
}

/**
 * Infrastructure configuration for session backends.
 * Comes from deployment settings, never from user requests.
 */
export interface SessionBackendConfig {
  // Redis specific
  redisUrl?: string;
  keyPrefix?: string;

  // Memory specific
  now?: () => number;
}
