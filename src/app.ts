import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response as ExpressResponse,
} from 'express';
import { z } from 'zod';
import type { AccessGate } from './accessGate.js';
import { extractDocumentText, googleDocumentSchema } from './docsText.js';
import {
  InvalidRequestError,
  RateLimitedError,
  ServiceError,
  UpstreamExchangeError,
  errorMessage,
} from './errors.js';
import type { ResourceFetcher } from './googleResources.js';
import { getClientIp, logError, logInfo, logWarn, requestLogger } from './log.js';
import type { InternalRequestLimiter } from './rateLimiter.js';
import { googlePresentationSchema, summarizePresentation } from './slidesSummary.js';
import type { TokenLifecycleManager } from './tokenLifecycle.js';
import { normalizeUserId } from './userIdentity.js';

export type AppDependencies = {
  lifecycle: TokenLifecycleManager;
  gate: AccessGate;
  limiter: InternalRequestLimiter;
  resources: ResourceFetcher;
  /** Take the caller's address from X-Forwarded-For instead of the socket. */
  trustProxy: boolean;
  corsOrigins: readonly string[];
};

const API_KEY_HEADER = 'x-api-key';
const DEFAULT_SHEET_RANGE = 'Sheet1!A1:D10';

const userQuerySchema = z.object({
  user_id: z.string({ required_error: 'user_id is required' }),
});

const authUrlQuerySchema = userQuerySchema.extend({
  prompt: z.enum(['consent', 'none']).optional(),
});

const callbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().optional(),
});

const revokeInputSchema = z.object({
  user_id: z.string().optional(),
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const driveFilesQuerySchema = userQuerySchema.extend({
  page_size: z.coerce.number().int().min(1).max(1000).default(10),
  page_token: z.string().min(1).optional(),
  q: z.string().min(1).optional(),
  order_by: z.string().min(1).optional(),
  include_all_drives: booleanFlag,
  corpora: z.enum(['user', 'drive', 'domain', 'allDrives']).optional(),
});

const sheetValuesQuerySchema = userQuerySchema.extend({
  range: z.string().min(1).default(DEFAULT_SHEET_RANGE),
});

const driveAboutSchema = z.object({ user: z.unknown().optional() });

const bodyParserErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  type: z.string().optional(),
});

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    throw new InvalidRequestError(
      issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'Invalid request',
    );
  }
  return parsed.data;
}

/** Express 4 does not forward rejected promises; hand them to `next`. */
function route(handler: (req: Request, res: ExpressResponse) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function corsMiddleware(origins: readonly string[]): RequestHandler {
  const allowed = new Set(origins);
  return (req, res, next) => {
    const origin = req.get('origin');
    if (origin && allowed.has(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
      res.header('Access-Control-Allow-Headers', 'Content-Type, X-API-Key, X-Request-Id');
      res.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    }
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}

function errorBody(error: ServiceError): { error: string; error_description: string } {
  return { error: error.code, error_description: error.publicDescription };
}

export function createApp(deps: AppDependencies): Express {
  const { lifecycle, gate, limiter, resources } = deps;

  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json({ limit: '64kb' }));
  app.use(express.urlencoded({ extended: false }));
  if (deps.corsOrigins.length > 0) {
    app.use(corsMiddleware(deps.corsOrigins));
  }

  const remoteAddressOf = (req: Request): string | undefined =>
    deps.trustProxy ? getClientIp(req) : req.socket.remoteAddress;

  const requireInternal: RequestHandler = (req, _res, next) => {
    try {
      gate.check({ apiKey: req.get(API_KEY_HEADER), remoteAddress: remoteAddressOf(req) });
      next();
    } catch (error) {
      next(error);
    }
  };

  // Runs after requireInternal, so the key header is known to be present.
  const admit = (req: Request, userId?: string): void => {
    limiter.admit({ apiKey: req.get(API_KEY_HEADER) ?? '', userId });
  };

  const admitUser = (req: Request): string => {
    const { user_id } = parseInput(userQuerySchema, req.query);
    const userId = normalizeUserId(user_id);
    admit(req, userId);
    return userId;
  };

  app.get('/healthz', (_req: Request, res: ExpressResponse) => {
    res.json({ ok: true });
  });

  app.get('/auth/google/url', (req: Request, res: ExpressResponse) => {
    const { user_id, prompt } = parseInput(authUrlQuerySchema, req.query);
    const authUrl = lifecycle.beginFlow(user_id, { promptConsent: prompt !== 'none' });
    res.json({ auth_url: authUrl });
  });

  app.get(
    '/auth/google/callback',
    route(async (req, res) => {
      const query = parseInput(callbackQuerySchema, req.query);
      if (query.error) {
        throw new InvalidRequestError(`Authorization was not granted: ${query.error}`);
      }
      if (!query.code || !query.state) {
        throw new InvalidRequestError('code and state are required');
      }
      const completed = await lifecycle.completeFlow({ code: query.code, state: query.state });
      logInfo(req, 'google account connected', { userId: completed.userId });
      res.json({ connected: true, user_id: completed.userId });
    }),
  );

  app.get(
    '/auth/google/token',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      const token = await lifecycle.getValidToken(userId);
      res.json({
        access_token: token.accessToken,
        expires_at: new Date(token.expiresAt).toISOString(),
        scopes: token.scopes,
      });
    }),
  );

  app.post(
    '/auth/google/revoke',
    requireInternal,
    route(async (req, res) => {
      const fromBody = parseInput(revokeInputSchema, req.body ?? {});
      const fromQuery = parseInput(revokeInputSchema, req.query);
      const rawUserId = fromBody.user_id ?? fromQuery.user_id;
      if (rawUserId === undefined) {
        throw new InvalidRequestError('user_id is required');
      }
      const userId = normalizeUserId(rawUserId);
      admit(req, userId);
      const outcome = await lifecycle.revoke(userId);
      res.json({ revoked: true, upstream_notified: outcome.upstreamNotified });
    }),
  );

  app.get('/internal/ping', requireInternal, (req: Request, res: ExpressResponse) => {
    admit(req);
    res.json({ ok: true });
  });

  app.get(
    '/google/drive/me',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      const about = driveAboutSchema.safeParse(
        await resources.fetchJson(userId, { kind: 'drive.about' }),
      );
      res.json(about.success ? (about.data.user ?? {}) : {});
    }),
  );

  app.get(
    '/google/drive/files',
    requireInternal,
    route(async (req, res) => {
      const query = parseInput(driveFilesQuerySchema, req.query);
      const userId = normalizeUserId(query.user_id);
      admit(req, userId);
      const files = await resources.fetchJson(userId, {
        kind: 'drive.files',
        pageSize: query.page_size,
        pageToken: query.page_token,
        q: query.q,
        orderBy: query.order_by,
        includeAllDrives: query.include_all_drives,
        corpora: query.corpora,
      });
      res.json(files);
    }),
  );

  app.get(
    '/google/sheets/:spreadsheetId/values',
    requireInternal,
    route(async (req, res) => {
      const query = parseInput(sheetValuesQuerySchema, req.query);
      const userId = normalizeUserId(query.user_id);
      admit(req, userId);
      const values = await resources.fetchJson(userId, {
        kind: 'sheets.values',
        spreadsheetId: req.params.spreadsheetId,
        range: query.range,
      });
      res.json(values);
    }),
  );

  app.get(
    '/google/docs/:documentId',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      res.json(
        await resources.fetchJson(userId, {
          kind: 'docs.document',
          documentId: req.params.documentId,
        }),
      );
    }),
  );

  app.get(
    '/google/docs/:documentId/text',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      const raw = await resources.fetchJson(userId, {
        kind: 'docs.document',
        documentId: req.params.documentId,
      });
      const document = googleDocumentSchema.safeParse(raw);
      if (!document.success) {
        throw new UpstreamExchangeError('Docs API returned an unexpected document shape');
      }
      res.json(extractDocumentText(document.data));
    }),
  );

  app.get(
    '/google/slides/:presentationId',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      res.json(
        await resources.fetchJson(userId, {
          kind: 'slides.presentation',
          presentationId: req.params.presentationId,
        }),
      );
    }),
  );

  app.get(
    '/google/slides/:presentationId/summary',
    requireInternal,
    route(async (req, res) => {
      const userId = admitUser(req);
      const raw = await resources.fetchJson(userId, {
        kind: 'slides.presentation',
        presentationId: req.params.presentationId,
      });
      const presentation = googlePresentationSchema.safeParse(raw);
      if (!presentation.success) {
        throw new UpstreamExchangeError('Slides API returned an unexpected presentation shape');
      }
      res.json(summarizePresentation(presentation.data));
    }),
  );

  app.use((_req: Request, res: ExpressResponse) => {
    res.status(404).json({ error: 'not_found', error_description: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: ExpressResponse, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ServiceError) {
      if (error instanceof RateLimitedError) {
        res.setHeader('Retry-After', String(error.retryAfterSeconds));
      }
      if (error.status >= 500) {
        logError(req, `${error.code}: ${error.message}`);
      } else {
        logWarn(req, `${error.code}: ${error.message}`);
      }
      res.status(error.status).json(errorBody(error));
      return;
    }

    // body-parser errors carry their own 4xx status.
    const parserError = bodyParserErrorSchema.safeParse(error);
    if (parserError.success) {
      logWarn(req, `request body rejected: ${parserError.data.type ?? 'unknown'}`);
      res
        .status(parserError.data.status)
        .json({ error: 'invalid_request', error_description: 'Malformed request body' });
      return;
    }

    logError(req, 'unhandled error', { error: errorMessage(error) });
    res.status(500).json({ error: 'internal_error', error_description: 'Internal server error' });
  });

  return app;
}
