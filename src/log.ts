import type { NextFunction, Request, Response as ExpressResponse } from 'express';
import crypto from 'node:crypto';

export type LogFields = Record<string, unknown>;
type LogLevel = 'info' | 'warn' | 'error';

export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string' && forwarded.trim() !== '') {
    const first = forwarded
      .split(',')
      .map((value) => value.trim())
      .find((value) => value.length > 0);
    if (first) {
      return first;
    }
  } else if (Array.isArray(forwarded) && forwarded.length > 0) {
    const first = forwarded
      .map((value) => value.trim())
      .find((value) => value.length > 0);
    if (first) {
      return first;
    }
  }
  return req.socket.remoteAddress ?? '-';
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  return level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
}

function requestIdOf(req: Request): string | undefined {
  const value: unknown = req.res?.locals.requestId;
  return typeof value === 'string' ? value : undefined;
}

function logWithLevel(level: LogLevel, req: Request, message: string, fields?: LogFields): void {
  const consoleMethod = consoleFor(level);
  const requestId = requestIdOf(req);
  const context = `${req.method} ${req.path} from ${getClientIp(req)}${
    requestId ? ` [${requestId}]` : ''
  }`;
  if (fields) {
    consoleMethod(`[${level}] ${message} — ${context}`, fields);
  } else {
    consoleMethod(`[${level}] ${message} — ${context}`);
  }
}

export const logInfo = (req: Request, message: string, fields?: LogFields): void =>
  logWithLevel('info', req, message, fields);
export const logWarn = (req: Request, message: string, fields?: LogFields): void =>
  logWithLevel('warn', req, message, fields);
export const logError = (req: Request, message: string, fields?: LogFields): void =>
  logWithLevel('error', req, message, fields);

export type Logger = {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
};

/** Logger for code that runs outside a request (store, lifecycle, startup). */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    const consoleMethod = consoleFor(level);
    if (fields) {
      consoleMethod(`[${level}] [${scope}] ${message}`, fields);
    } else {
      consoleMethod(`[${level}] [${scope}] ${message}`);
    }
  };
  return {
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  };
}

export function maskSecret(value?: string | null): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}…`;
  }
  return `${trimmed.slice(0, 4)}…${trimmed.slice(-4)}`;
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function requestLogger(req: Request, res: ExpressResponse, next: NextFunction): void {
  const start = Date.now();
  const incoming = req.get('x-request-id');
  const requestId =
    incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : crypto.randomUUID();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const remote = getClientIp(req);
  // Query strings carry codes and state tokens; log the path only.
  console.log(`[request] ${remote} ${req.method} ${req.path} [${requestId}]`);
  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(
      `[response] ${remote} ${req.method} ${req.path} -> ${res.statusCode} (${duration}ms) [${requestId}]`,
    );
  });
  next();
}
