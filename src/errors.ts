export type TradingErrorKind =
  | 'CONFIG'
  | 'INSUFFICIENT_BALANCE'
  | 'GATEWAY'
  | 'STALE_DATA'
  | 'INVARIANT_VIOLATION';

/**
 * 트레이딩 에러 공통 베이스: kind 태그로 분기
 */
export abstract class TradingError extends Error {
  abstract readonly kind: TradingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 필수 설정 누락/오류: 기동 시 치명적 */
export class ConfigError extends TradingError {
  readonly kind = 'CONFIG' as const;

  constructor(
    readonly key: string,
    detail: string,
  ) {
    super(`Invalid configuration ${key}: ${detail}`);
  }
}

/** 사이징 결과가 거래소 최소 주문 미만: 이번 틱 진입만 스킵 */
export class InsufficientBalanceError extends TradingError {
  readonly kind = 'INSUFFICIENT_BALANCE' as const;

  constructor(
    readonly available: number,
    readonly required: number,
    detail: string,
  ) {
    super(`Insufficient balance: ${detail}`);
  }
}

export type GatewayFailureReason =
  | 'network'          // 타임아웃/연결 실패 — 결과 불명
  | 'rejected'         // 거래소가 요청을 거절 (4xx)
  | 'not_found'        // 주문 없음
  | 'auth'             // 401/403 — 키 확인 필요
  | 'invalid_response'; // 응답 스키마 불일치

/** 거래소 게이트웨이 호출 실패: 다음 틱 재시도, 페어별 연속 실패 카운트 */
export class GatewayError extends TradingError {
  readonly kind = 'GATEWAY' as const;

  constructor(
    readonly reason: GatewayFailureReason,
    message: string,
    readonly exchangeCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** 요청이 거래소에 도달했는지 알 수 없는 경우 */
  get outcomeUnknown(): boolean {
    return this.reason === 'network' || this.reason === 'invalid_response';
  }
}

/** 스냅샷이 너무 오래됨: 이번 틱 판단 스킵 */
export class StaleDataError extends TradingError {
  readonly kind = 'STALE_DATA' as const;

  constructor(
    readonly ageMs: number,
    readonly maxAgeMs: number,
  ) {
    super(`Market snapshot is stale: age ${ageMs}ms > ${maxAgeMs}ms`);
  }
}

/** 내부 불변식 위반: 해당 페어 거래 중단 */
export class InvariantViolationError extends TradingError {
  readonly kind = 'INVARIANT_VIOLATION' as const;
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export function isInsufficientBalance(err: unknown): err is InsufficientBalanceError {
  return err instanceof InsufficientBalanceError;
}

export function isInvariantViolation(err: unknown): err is InvariantViolationError {
  return err instanceof InvariantViolationError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
