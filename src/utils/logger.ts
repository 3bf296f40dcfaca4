import pino from 'pino';

import { config } from '@config/env.config';

export type LogMeta = Record<string, unknown>;

const base = pino({
  level: config.LOG_LEVEL,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export interface Logger {
  trace(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

function wrap(target: pino.Logger): Logger {
  return {
    trace: (msg, meta) => target.trace(meta ?? {}, msg),
    debug: (msg, meta) => target.debug(meta ?? {}, msg),
    info: (msg, meta) => target.info(meta ?? {}, msg),
    warn: (msg, meta) => target.warn(meta ?? {}, msg),
    error: (msg, meta) => target.error(meta ?? {}, msg),
    child: (bindings) => wrap(target.child(bindings)),
  };
}

export const logger: Logger = wrap(base);
