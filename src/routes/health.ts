import { Hono } from 'hono';
import type { InitializationCoordinator } from '@/services/cache/coordinator';
import type { HostLifecycle } from '@/types/lifecycle';
import { describeError } from '@/types/errors';

export interface HealthRouteOptions {
  coordinator: InitializationCoordinator;
  lifecycle?: HostLifecycle;
}

export function healthRoutes({ coordinator, lifecycle }: HealthRouteOptions) {
  const routes = new Hono();

  routes.get('/', (c) => {
    return c.json({
      status: 'healthy',
      service: 'page-cache-service',
      cache: coordinator.state,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get('/ready', async (c) => {
    // Initializes the cache if no request has yet
    const snapshot = await coordinator.ensureInitialized(lifecycle);

    if (snapshot.isErr()) {
      return c.json({
        status: 'not ready',
        checks: {
          cache: 'failed',
          error: describeError(snapshot.error),
        },
      }, 503);
    }

    return c.json({
      status: 'ready',
      checks: {
        cache: 'ok',
        pages: snapshot.value.entries.size,
      },
    });
  });

  return routes;
}
