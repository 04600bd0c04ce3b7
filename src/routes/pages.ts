import path from 'path';
import { Hono } from 'hono';
import type { RequestRouter } from '@/services/cache/request-router';
import type { RenderingPipeline } from '@/services/rendering/pipeline';
import { describeError } from '@/types/errors';
import { normalizePath, isPathSafe } from '@/utils/request-path';
import { createLogger } from '@/utils/logger';

const log = createLogger('pages');

export interface PageRouteOptions {
  router: RequestRouter;
  pipeline: RenderingPipeline;
  appRoot: string;
}

/**
 * Serve pages from the application tree or the page cache
 */
export function pageRoutes({ router, pipeline, appRoot }: PageRouteOptions) {
  const routes = new Hono();

  // HEAD requests are dispatched here as GET; the renderer drops their body
  routes.get('/*', async (c) => {
    const cleanPath = normalizePath(c.req.path);

    if (!isPathSafe(cleanPath)) {
      return c.text('Invalid path', 400);
    }

    const physicalPath = path.join(appRoot, ...cleanPath.split('/'));
    const resolved = await router.resolve('/' + cleanPath, physicalPath);

    if (resolved.isErr()) {
      log.error(`Unable to resolve ${cleanPath}: ${describeError(resolved.error)}`);
      return c.text('Internal Server Error', 500);
    }

    log.debug(`${cleanPath} -> ${resolved.value.kind} ${resolved.value.path}`);
    return pipeline.render(resolved.value, c.req.raw);
  });

  return routes;
}
