import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createChildLogger } from './logger.js';
import { parsePair, type Position } from './types/index.js';
import type { PairReport } from './engine/scheduler.js';

const log = createChildLogger('api-server');

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

/** 관리 API가 의존하는 제어면 (PairScheduler 가 구현) */
export interface AdminController {
  readonly isRunning: boolean;
  report(): PairReport[];
  pause(symbol: string): boolean;
  resume(symbol: string): boolean;
  reset(symbol: string): boolean;
  positions(symbol: string): readonly Readonly<Position>[] | undefined;
}

const jsonHeaders: Record<string, string> = {
  'Content-Type': 'application/json',
};

const PAIR_ROUTE = /^\/api\/pairs\/([^/]+)\/(pause|resume|reset|positions)\/?$/;

function send(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, jsonHeaders);
  res.end(JSON.stringify(body));
}

/** 경로의 페어 표기: ADA-USDT, ADA_USDT, ADA%2FUSDT 모두 허용 */
function pairFromPath(segment: string): string | null {
  try {
    return parsePair(decodeURIComponent(segment).replace(/[-_]/, '/')).symbol;
  } catch {
    return null;
  }
}

/**
 * API 요청 핸들러 생성 (테스트에서 mock req/res 로 직접 호출)
 */
export function createApiHandler(controller: AdminController): ApiHandler {
  return async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = (req.url ?? '').split('?')[0] ?? '';
    const method = req.method ?? '';

    if (url === '/api/status' || url === '/api/status/') {
      if (method !== 'GET') {
        send(res, 405, { error: 'Method not allowed' });
        return;
      }
      send(res, 200, { running: controller.isRunning, pairs: controller.report() });
      return;
    }

    const match = PAIR_ROUTE.exec(url);
    if (match && match[1] && match[2]) {
      const symbol = pairFromPath(match[1]);
      const action = match[2];
      if (!symbol) {
        send(res, 400, { error: `Invalid pair ${match[1]}` });
        return;
      }

      if (action === 'positions') {
        if (method !== 'GET') {
          send(res, 405, { error: 'Method not allowed' });
          return;
        }
        const positions = controller.positions(symbol);
        if (!positions) {
          send(res, 404, { error: `Unknown pair ${symbol}` });
          return;
        }
        send(res, 200, positions);
        return;
      }

      if (method !== 'POST') {
        send(res, 405, { error: 'Method not allowed' });
        return;
      }
      if (!controller.report().some((r) => r.status.symbol === symbol)) {
        send(res, 404, { error: `Unknown pair ${symbol}` });
        return;
      }
      const changed =
        action === 'pause' ? controller.pause(symbol)
          : action === 'resume' ? controller.resume(symbol)
            : controller.reset(symbol);
      log.info({ pair: symbol, action, changed }, 'Admin pair control');
      const status = controller.report().find((r) => r.status.symbol === symbol)?.status;
      // 현재 상태에서 불가능한 전환 (예: 정지 아닌 페어 reset) → 409
      send(res, changed ? 200 : 409, { ok: changed, status });
      return;
    }

    send(res, 404, { error: 'Not found' });
  };
}

export function startApiServer(controller: AdminController, port: number): Server {
  const handler = createApiHandler(controller);
  const server = createServer((req, res) => {
    handler(req, res).catch((err) => {
      log.error({ err }, 'Admin API handler error');
      if (!res.headersSent) send(res, 500, { error: 'Internal error' });
    });
  });
  server.listen(port, () => {
    log.info({ port }, 'Admin API server listening');
  });
  return server;
}
