import { AccessGate } from './accessGate.js';
import { createApp } from './app.js';
import { loadConfig, type ServiceConfig } from './config.js';
import { CredentialCipher } from './credentialCipher.js';
import { ConfigError, errorMessage } from './errors.js';
import { GoogleOAuthClient } from './googleOAuthClient.js';
import { GoogleResourceClient } from './googleResources.js';
import { createLogger, maskSecret } from './log.js';
import { FixedWindowRateLimiter, InternalRequestLimiter } from './rateLimiter.js';
import { StateCodec } from './stateCodec.js';
import { TokenLifecycleManager } from './tokenLifecycle.js';
import { createTokenStore } from './tokenStore.js';

const log = createLogger('server');
const HOUSEKEEPING_INTERVAL_MS = 60_000;

function readConfig(): ServiceConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[error] ${error.message}`, error.fieldErrors);
    } else {
      console.error('[error] Failed to load configuration:', error);
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  const cipher = new CredentialCipher(config.encryption.primary, config.encryption.previous);
  const store = await createTokenStore(config.database, cipher);
  const stateCodec = new StateCodec(config.stateSecret, config.stateTtlMs);
  const provider = new GoogleOAuthClient({
    settings: config.google,
    allowedRedirectHosts: config.allowedRedirectHosts,
    timeoutMs: config.upstreamTimeoutMs,
  });
  const lifecycle = new TokenLifecycleManager({
    store,
    provider,
    stateCodec,
    refreshMarginMs: config.refreshMarginMs,
    singleUseState: config.stateSingleUse,
    defaultScopes: config.google.scopes,
  });
  const gate = new AccessGate({
    apiKey: config.internalApiKey,
    allowedOrigins: config.internalAllowedIps,
  });
  const limiter = new InternalRequestLimiter(new FixedWindowRateLimiter(), config.rateLimits);
  const resources = new GoogleResourceClient(lifecycle, config.upstreamTimeoutMs);

  const app = createApp({
    lifecycle,
    gate,
    limiter,
    resources,
    trustProxy: config.trustProxy,
    corsOrigins: config.corsOrigins,
  });

  const housekeeping = setInterval(() => {
    limiter.cleanup();
    store
      .pruneConsumedStates(Date.now())
      .then((pruned) => {
        if (pruned > 0) {
          log.info('pruned consumed state nonces', { pruned });
        }
      })
      .catch((error: unknown) => {
        log.error('failed to prune consumed state nonces', { error: errorMessage(error) });
      });
  }, HOUSEKEEPING_INTERVAL_MS);
  housekeeping.unref();

  const server = app.listen(config.port, () => {
    log.info(`listening on port ${config.port}`, {
      redirectUri: config.google.redirectUri,
      clientId: maskSecret(config.google.clientId),
      storage: config.database.driver ?? 'memory',
      keyId: config.encryption.primary.id,
      originCheck: gate.originCheckEnabled,
    });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info(`received ${signal}; shutting down`);
    clearInterval(housekeeping);
    server.close();
    store
      .close()
      .catch((error: unknown) => {
        log.error('failed to close token store cleanly', { error: errorMessage(error) });
      })
      .finally(() => {
        process.exit(0);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.error('failed to start', { error: errorMessage(error) });
  process.exit(1);
});
