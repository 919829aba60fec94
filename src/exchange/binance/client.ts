import { request as undiciRequest, type Dispatcher } from 'undici';
import type { z } from 'zod';
import { GatewayError } from '../../errors.js';
import { createChildLogger } from '../../logger.js';
import { buildSignedQuery, DEFAULT_RECV_WINDOW } from './auth.js';
import { BinanceErrorBodySchema } from './schemas.js';

const log = createChildLogger('binance-client');

const DEFAULT_TIMEOUT_MS = 10_000;
const RETRY_BASE_MS = 1000;

/** 존재하지 않는 주문 (조회/취소) */
const NO_SUCH_ORDER = -2013;
const CANCEL_REJECTED = -2011;

export interface BinanceClientOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  maxRetries: number;
  timeoutMs?: number;
  retryBaseMs?: number;
  recvWindow?: number;
  /** 테스트용 (undici MockAgent) */
  dispatcher?: Dispatcher;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RequestOptions {
  /**
   * 재시도 허용 여부. 주문 생성처럼 멱등이 아닌 호출은 false —
   * 결과 불명은 호출자가 clientOrderId 조회로 확정한다.
   */
  retry?: boolean;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 418 || status >= 500;
}

function isAuthError(status: number): boolean {
  return status === 401 || status === 403;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

interface RawResponse {
  statusCode: number;
  text: string;
}

/**
 * 바이낸스 REST 클라이언트: undici + zod.
 * 429/418/5xx/네트워크 실패는 지수 백오프 재시도 (retry=false면 1회만).
 * 모든 실패는 GatewayError 로 분류해 던진다.
 */
export class BinanceRestClient {
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;

  constructor(private readonly opts: BinanceClientOptions) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryBaseMs = opts.retryBaseMs ?? RETRY_BASE_MS;
  }

  /** Public GET + zod 검증 */
  async requestPublic<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = new URL(path, this.opts.baseUrl);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    const res = await this.send(path, () => url.toString(), 'GET', {}, true);
    return this.parse(path, res, schema);
  }

  /**
   * SIGNED 요청: X-MBX-APIKEY 헤더 + HMAC 서명 query.
   * 재시도마다 timestamp를 새로 찍어 서명한다.
   */
  async requestSigned<T>(
    method: HttpMethod,
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    if (!this.opts.apiKey) {
      throw new GatewayError('auth', 'Exchange API key not configured');
    }
    const recvWindow = this.opts.recvWindow ?? DEFAULT_RECV_WINDOW;
    const buildUrl = (): string => {
      const query = buildSignedQuery(params, this.opts.apiSecret, Date.now(), recvWindow);
      return `${new URL(path, this.opts.baseUrl).toString()}?${query}`;
    };
    const res = await this.send(
      path,
      buildUrl,
      method,
      { 'X-MBX-APIKEY': this.opts.apiKey },
      options.retry ?? true,
    );
    return this.parse(path, res, schema);
  }

  private async send(
    path: string,
    buildUrl: () => string,
    method: HttpMethod,
    headers: Record<string, string>,
    retry: boolean,
  ): Promise<RawResponse> {
    const maxRetries = retry ? this.opts.maxRetries : 0;
    let lastError: GatewayError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      let res: RawResponse;
      try {
        const { statusCode, body } = await undiciRequest(buildUrl(), {
          method,
          headers: { Accept: 'application/json', ...headers },
          bodyTimeout: this.timeoutMs,
          headersTimeout: this.timeoutMs,
          dispatcher: this.opts.dispatcher,
        });
        res = { statusCode, text: await body.text() };
      } catch (err) {
        lastError = new GatewayError('network', `${method} ${path} failed: ${errorMessage(err)}`, undefined, {
          cause: err,
        });
        if (attempt < maxRetries) {
          const delay = this.retryBaseMs * Math.pow(2, attempt);
          log.warn({ path, attempt, delay, err }, 'Request failed, retrying');
          await sleep(delay);
          continue;
        }
        throw lastError;
      }

      if (res.statusCode === 200) return res;

      if (isAuthError(res.statusCode)) {
        log.error({ statusCode: res.statusCode, path, body: res.text }, 'Auth error — check API keys (401/403)');
        throw this.toError('auth', path, res);
      }
      if (isRetryableStatus(res.statusCode)) {
        // 5xx: 거래소가 처리했는지 알 수 없음 / 429·418: 거절됨
        lastError = this.toError(res.statusCode >= 500 ? 'network' : 'rejected', path, res);
        if (attempt < maxRetries) {
          const delay = this.retryBaseMs * Math.pow(2, attempt);
          log.warn({ statusCode: res.statusCode, path, attempt, delay }, 'Retryable error, backing off');
          await sleep(delay);
          continue;
        }
        throw lastError;
      }
      throw this.toError('rejected', path, res);
    }
    throw lastError ?? new GatewayError('network', `${method} ${path} failed after retries`);
  }

  private toError(fallback: 'auth' | 'rejected' | 'network', path: string, res: RawResponse): GatewayError {
    const body = parseErrorBody(res.text);
    if (!body) {
      return new GatewayError(fallback, `${path} HTTP ${res.statusCode}`);
    }
    const notFound =
      body.code === NO_SUCH_ORDER || (body.code === CANCEL_REJECTED && body.msg.startsWith('Unknown order'));
    return new GatewayError(
      notFound ? 'not_found' : fallback,
      `${path} HTTP ${res.statusCode} [${body.code}] ${body.msg}`,
      body.code,
    );
  }

  /** zod 검증 실패 시 raw 로그 후 invalid_response */
  private parse<T>(path: string, res: RawResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let raw: unknown;
    try {
      raw = JSON.parse(res.text);
    } catch (err) {
      log.warn({ path, body: res.text.slice(0, 500) }, 'Response is not JSON');
      throw new GatewayError('invalid_response', `${path} returned non-JSON body`, undefined, { cause: err });
    }
    const result = schema.safeParse(raw);
    if (result.success) return result.data;
    log.warn({ path, raw: res.text.slice(0, 2000) }, 'Response validation failed; raw dump');
    throw new GatewayError('invalid_response', `${path} response validation failed: ${result.error.message}`);
  }
}

function parseErrorBody(text: string): { code: number; msg: string } | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const result = BinanceErrorBodySchema.safeParse(raw);
  return result.success ? result.data : null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
