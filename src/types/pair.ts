/**
 * 페어 루프 상태
 * - RUNNING: 정상 틱
 * - PAUSED: 운영자 일시정지 (틱 사이에서만 적용)
 * - SUSPENDED: 연속 실패/불변식 위반으로 정지: reset 필요
 */
export type PairRunState = 'RUNNING' | 'PAUSED' | 'SUSPENDED';

export interface PairStatus {
  readonly symbol: string;
  readonly state: PairRunState;
  readonly consecutiveFailures: number;
  readonly reason?: string;
  readonly lastTickAt?: number;
}
