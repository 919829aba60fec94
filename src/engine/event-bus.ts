import type { EngineEvent } from '../types/index.js';

type Handler = (event: EngineEvent) => void;

/**
 * 이벤트 버스: 감사 로그/알림 구독
 * 핸들러 예외는 다른 구독자/엔진으로 전파하지 않는다.
 */
export class EventBus {
  private handlers: Handler[] = [];

  constructor(private readonly onHandlerError: (err: unknown, event: EngineEvent) => void = () => undefined) {}

  onAny(handler: Handler): void {
    this.handlers.push(handler);
  }

  emit(event: EngineEvent): void {
    for (const h of this.handlers) {
      try {
        h(event);
      } catch (err) {
        this.onHandlerError(err, event);
      }
    }
  }
}
