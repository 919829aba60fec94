import { createHmac } from 'node:crypto';

/** 서명 요청 기본 recvWindow (ms) */
export const DEFAULT_RECV_WINDOW = 5000;

/** 삽입 순서 유지 query string (서명 대상과 전송 문자열이 같아야 함) */
export function toQueryString(params: Record<string, string>): string {
  return new URLSearchParams(params).toString();
}

/**
 * SIGNED 엔드포인트 서명: HMAC-SHA256(totalParams, secret) 소문자 hex
 */
export function signQuery(query: string, secret: string): string {
  return createHmac('sha256', secret).update(query).digest('hex');
}

/**
 * timestamp/recvWindow를 붙이고 signature까지 포함한 query string 생성
 */
export function buildSignedQuery(
  params: Record<string, string>,
  secret: string,
  timestamp: number = Date.now(),
  recvWindow: number = DEFAULT_RECV_WINDOW,
): string {
  if (!secret) {
    throw new Error('Exchange API secret not configured');
  }
  const query = toQueryString({
    ...params,
    recvWindow: String(recvWindow),
    timestamp: String(timestamp),
  });
  return `${query}&signature=${signQuery(query, secret)}`;
}
