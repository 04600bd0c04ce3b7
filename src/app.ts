import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { CacheDirectory } from '@/services/cache/cache-directory';
import { InitializationCoordinator } from '@/services/cache/coordinator';
import { RequestRouter } from '@/services/cache/request-router';
import { resolveRenderingPipeline, type RenderingHost } from '@/services/rendering/pipeline';
import { ZipPackageLoader } from '@/adapters/packages/zip-package';
import { createStaticConfiguration, type ConfigurationSource, type PageCacheSettings } from '@/config/settings';
import type { HostLifecycle } from '@/types/lifecycle';
import type { PackageLoader } from '@/types/package';
import { pageRoutes } from './routes/pages';
import { healthRoutes } from './routes/health';
import { createLogger } from './utils/logger';

const log = createLogger('app');

export interface AppOptions {
  settings: PageCacheSettings;
  lifecycle?: HostLifecycle;
  /** Defaults to ZIP archives under `settings.packagesPath`. */
  packages?: PackageLoader;
  /** Defaults to the fixed bindings and flag in `settings`. */
  config?: ConfigurationSource;
  rendering?: RenderingHost;
  caseInsensitivePaths?: boolean;
  accessLog?: boolean;
}

export interface PageApp {
  app: Hono;
  coordinator: InitializationCoordinator;
  router: RequestRouter;
}

export function createApp(options: AppOptions): PageApp {
  const { settings, lifecycle } = options;
  const config = options.config ?? createStaticConfiguration(settings);

  const coordinator = new InitializationCoordinator({
    cache: new CacheDirectory({ parent: settings.cacheParent }),
    packages: options.packages ?? new ZipPackageLoader(settings.packagesPath),
    config,
    caseInsensitivePaths: options.caseInsensitivePaths,
  });

  const router = new RequestRouter(coordinator, {
    appRoot: settings.appRoot,
    allowFilesystemPages: () => config.allowFilesystemPages(),
    lifecycle,
    caseInsensitivePaths: options.caseInsensitivePaths,
  });

  const pipeline = resolveRenderingPipeline(options.rendering);

  const app = new Hono();

  // Global middleware
  if (options.accessLog !== false) {
    app.use('*', logger());
  }

  app.route('/health', healthRoutes({ coordinator, lifecycle }));
  app.route('/', pageRoutes({ router, pipeline, appRoot: settings.appRoot }));

  app.notFound((c) => {
    return c.text('Not Found', 404);
  });

  app.onError((error, c) => {
    log.error('Application error:', error);
    return c.text('Internal Server Error', 500);
  });

  return { app, coordinator, router };
}
