import { serve } from '@hono/node-server';
import { createApp } from '../src/app';
import { loadSettings } from '../src/config/settings';
import { createProcessLifecycle } from '../src/adapters/lifecycle/process-lifecycle';
import { createLogger, setLogLevel } from '../src/utils/logger';
import type { Env } from '../src/types/env';

const env: Env = {
  PAGE_PACKAGES: process.env.PAGE_PACKAGES,
  ALLOW_FILESYSTEM_PAGES: process.env.ALLOW_FILESYSTEM_PAGES,
  APP_ROOT: process.env.APP_ROOT,
  PACKAGES_PATH: process.env.PACKAGES_PATH,
  PAGE_CACHE_DIR: process.env.PAGE_CACHE_DIR,
  PORT: process.env.PORT,
  HOST: process.env.HOST,
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  CACHE_CONTROL: process.env.CACHE_CONTROL,
};

setLogLevel(env.LOG_LEVEL);
const log = createLogger('server');

const settings = loadSettings(env);
const lifecycle = createProcessLifecycle();
const { app, coordinator } = createApp({
  settings,
  lifecycle,
  rendering: { cacheControl: env.CACHE_CONTROL },
});

const port = parseInt(env.PORT || '3000');
const host = env.HOST || '0.0.0.0';

log.info('Page cache service starting...');
log.info(`Application root: ${settings.appRoot}`);
log.info(`Packages: ${settings.bindings.map((b) => `${b.packageId}=${b.namespaceRoot}`).join(', ') || '(none)'}`);
log.info(`Filesystem pages: ${settings.allowFilesystemPages ? 'allowed' : 'disabled'}`);

const server = serve({
  fetch: app.fetch,
  port,
  hostname: host,
});

// Registered before the cache's own hook: stop accepting requests, then delete the cache
lifecycle.onShutdown(
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    })
);

// Extract at startup instead of on the first request
coordinator.ensureInitialized(lifecycle).then((result) => {
  if (result.isErr()) {
    log.error('Page cache is not ready; requests will retry initialization');
    return;
  }
  log.info(`Service running on http://${host}:${port}`);
}, (error: unknown) => {
  log.error('Unexpected initialization error:', error);
});

function parseLogLevel(value: string | undefined): Env['LOG_LEVEL'] {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}
