import { z } from 'zod';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AdminOperations, AdminResult } from '../types.js';

export const API_PREFIX = '/sync/api';

const TargetsBodySchema = z.object({ targets: z.array(z.string()) });
const ExcludesBodySchema = z.object({ excludes: z.array(z.string()) });

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** Read the full request body as a string. */
function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

/** Parse JSON body, returning null on failure. */
async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  try {
    const raw = await readBody(req);
    return raw ? JSON.parse(raw) : null;
  } catch {
    return null;
  }
}

function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-cache',
  });
  res.end(JSON.stringify(data));
}

function sendError(res: ServerResponse, message: string, status = 404): void {
  sendJson(res, { ok: false, error: message }, status);
}

/** Failed operations answer 500 with the result body. */
function sendResult(res: ServerResponse, result: AdminResult<object>): void {
  sendJson(res, result, result.ok ? 200 : 500);
}

/**
 * Build the request handler for the administrative API. Every route sits
 * under `/sync/api`; mutating routes are POST only.
 */
export function createAdminHandler(ops: AdminOperations): RequestHandler {
  const actions: Record<string, () => Promise<AdminResult<object>>> = {
    init: () => ops.initOnce(),
    'sync-now': () => ops.syncNow(),
    pull: () => ops.pullOnly(),
    push: () => ops.pushOnly(),
    relink: () => ops.relink(),
    'track-empty': () => ops.trackEmptyOnly(),
  };

  return async (req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname.replace(/\/+$/, '');
    const method = req.method ?? 'GET';

    if (!pathname.startsWith(API_PREFIX + '/')) {
      sendError(res, 'Not found');
      return;
    }
    const route = pathname.slice(API_PREFIX.length + 1);

    if (route === 'status' && method === 'GET') {
      try {
        sendJson(res, await ops.status());
      } catch (error) {
        sendError(
          res,
          `Error reading status: ${error instanceof Error ? error.message : String(error)}`,
          500,
        );
      }
      return;
    }

    const action = Object.hasOwn(actions, route) ? actions[route] : undefined;
    if (action) {
      if (method !== 'POST') {
        sendError(res, 'Method not allowed', 405);
        return;
      }
      sendResult(res, await action());
      return;
    }

    if (route === 'targets') {
      if (method === 'GET') {
        sendJson(res, { targets: ops.getTargets() });
        return;
      }
      if (method === 'POST') {
        const body = TargetsBodySchema.safeParse(await parseJsonBody(req));
        if (!body.success) {
          sendError(res, 'Body must be {"targets": string[]}', 400);
          return;
        }
        sendResult(res, await ops.setTargets(body.data.targets));
        return;
      }
      sendError(res, 'Method not allowed', 405);
      return;
    }

    if (route === 'excludes') {
      if (method === 'GET') {
        sendJson(res, { excludes: ops.getExcludes() });
        return;
      }
      if (method === 'POST') {
        const body = ExcludesBodySchema.safeParse(await parseJsonBody(req));
        if (!body.success) {
          sendError(res, 'Body must be {"excludes": string[]}', 400);
          return;
        }
        sendResult(res, await ops.setExcludes(body.data.excludes));
        return;
      }
      sendError(res, 'Method not allowed', 405);
      return;
    }

    sendError(res, 'Not found');
  };
}
