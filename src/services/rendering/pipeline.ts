import { promises as fs } from 'fs';
import type { ResolvedTarget } from '@/services/cache/request-router';
import { getMimeType } from '@/utils/mime-types';
import { getCacheControl } from '@/utils/request-path';
import { createLogger } from '@/utils/logger';

const log = createLogger('render');

export interface RenderRequest {
  /** Original request URL path */
  url: string;
  /** Resolved physical file */
  physicalPath: string;
  request: Request;
}

export interface PageRenderer {
  render(request: RenderRequest): Promise<Response>;
}

/**
 * Renderers a host can offer. `publicEntry` renders any resolved file;
 * `internalEntry`, when present, is preferred for files from the application
 * tree.
 */
export interface RenderingHost {
  publicEntry?: PageRenderer;
  internalEntry?: PageRenderer;
  cacheControl?: string;
}

export interface RenderingPipeline {
  readonly capabilities: { publicEntry: 'host' | 'builtin'; internalEntry: 'host' | 'public' };
  render(target: ResolvedTarget, request: Request): Promise<Response>;
}

/**
 * Pick the renderers once, at startup. Cache targets always go through the
 * public entry; filesystem targets through the internal entry when the host
 * has one.
 */
export function resolveRenderingPipeline(host: RenderingHost = {}): RenderingPipeline {
  const publicEntry = host.publicEntry ?? createFileRenderer({ cacheControl: host.cacheControl });
  const internalEntry = host.internalEntry ?? publicEntry;

  const capabilities = {
    publicEntry: host.publicEntry ? 'host' : 'builtin',
    internalEntry: host.internalEntry ? 'host' : 'public',
  } as const;
  log.debug('Rendering capabilities', capabilities);

  return {
    capabilities,
    render(target, request) {
      const renderer = target.kind === 'filesystem' ? internalEntry : publicEntry;
      return renderer.render({ url: target.virtualPath, physicalPath: target.path, request });
    },
  };
}

export interface FileRendererOptions {
  cacheControl?: string;
}

/**
 * Serves the resolved file as-is, typed by extension.
 */
export function createFileRenderer(options: FileRendererOptions = {}): PageRenderer {
  return {
    async render({ url, physicalPath, request }) {
      let body: Buffer;
      try {
        body = await fs.readFile(physicalPath);
      } catch (error) {
        if (isMissingFile(error)) {
          return new Response('Not Found', { status: 404, headers: { 'Content-Type': 'text/plain; charset=utf-8' } });
        }
        throw error;
      }

      const headers: Record<string, string> = {
        'Content-Type': getMimeType(physicalPath),
        'Cache-Control': options.cacheControl || getCacheControl(url),
        'Content-Length': body.length.toString(),
      };

      if (request.method === 'HEAD') {
        return new Response(null, { headers });
      }
      return new Response(body, { headers });
    },
  };
}

function isMissingFile(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'EISDIR';
}
