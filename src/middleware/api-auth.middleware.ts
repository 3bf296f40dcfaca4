import { timingSafeEqual } from 'crypto';

import type { RequestHandler } from 'express';

import type { ApiClientKey } from '@config/env.config';

import { logger } from '@utils/logger.js';

export interface ApiAuthOptions {
  enabled: boolean;
  headerKey: string;
  headerExtra: string;
  keys: readonly ApiClientKey[];
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/** The matching client for a key/extra pair, or null. */
export function authenticate(keys: readonly ApiClientKey[], key: string, extra: string): ApiClientKey | null {
  const client = keys.find((k) => k.key === key);
  if (!client || !safeEqual(client.extra, extra)) return null;
  return client;
}

export function hasPermission(client: ApiClientKey, permission: string): boolean {
  return client.permissions.length === 0 || client.permissions.includes(permission);
}

/** Requires a configured key pair carrying `permission`; a no-op when auth is disabled. */
export function requireApiKey(options: ApiAuthOptions, permission: string): RequestHandler {
  return (req, res, next) => {
    if (!options.enabled) {
      next();
      return;
    }
    const client = authenticate(
      options.keys,
      req.header(options.headerKey) ?? '',
      req.header(options.headerExtra) ?? '',
    );
    if (!client) {
      logger.warn('[api] unauthorized request', { path: req.path, ip: req.ip });
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }
    if (!hasPermission(client, permission)) {
      logger.warn('[api] permission denied', { client: client.name, permission });
      res.status(403).json({ message: 'Forbidden' });
      return;
    }
    req.apiClient = client;
    next();
  };
}
