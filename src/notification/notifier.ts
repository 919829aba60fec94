import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import type { PairReport } from '../engine/scheduler.js';
import type { EngineEvent, PositionClosedEvent, PositionOpenedEvent } from '../types/index.js';
import { TelegramNotifier } from './telegram.js';

const log = createChildLogger('notifier');

/** 가격/수량 표기: 소수 8자리까지, 뒤 0 제거 */
function fmt(n: number): string {
  return Number(n.toFixed(8)).toString();
}

/**
 * 알림 허브: TelegramNotifier 래핑 + 이벤트별 메시지 포맷
 * enabled=false이면 모든 호출 무시
 */
export class Notifier {
  private readonly tg: TelegramNotifier | null;

  constructor() {
    if (config.telegram.enabled && config.telegram.botToken && config.telegram.chatId) {
      this.tg = new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
      log.info('Telegram notifier enabled');
    } else {
      this.tg = null;
      log.debug('Telegram notifier disabled');
    }
  }

  get enabled(): boolean {
    return this.tg !== null;
  }

  /** 엔진 이벤트 중 운영자가 알아야 할 것만 전송 */
  handle(event: EngineEvent): void {
    switch (event.type) {
      case 'POSITION_OPENED':
        return this.notifyEntry(event);
      case 'POSITION_CLOSED':
        return this.notifyExit(event);
      case 'PAIR_SUSPENDED':
        return this.notifySuspended(event.symbol, event.reason);
      case 'INVARIANT_VIOLATION':
        return this.notifyInvariantViolation(event.symbol, event.detail);
      default:
        return;
    }
  }

  notifyEntry(e: PositionOpenedEvent): void {
    this.send(
      `📈 <b>매수 체결</b> ${e.symbol}\n` +
      `가격: ${fmt(e.entryPrice)}\n` +
      `수량: ${fmt(e.quantity)}\n` +
      `손절: ${fmt(e.stopLossPrice)} / 익절: ${fmt(e.profitTargetPrice)}`,
    );
  }

  notifyExit(e: PositionClosedEvent): void {
    const emoji = e.pnl >= 0 ? '💰' : '📉';
    this.send(
      `${emoji} <b>매도 체결</b> ${e.symbol}\n` +
      `가격: ${fmt(e.exitPrice)}\n` +
      `수량: ${fmt(e.quantity)}\n` +
      `손익: ${e.pnl >= 0 ? '+' : ''}${fmt(e.pnl)}\n` +
      `사유: ${e.reason}`,
    );
  }

  notifySuspended(symbol: string, reason: string): void {
    this.send(`🚨 <b>페어 정지</b> ${symbol}\n사유: ${reason}`);
  }

  notifyInvariantViolation(symbol: string, detail: string): void {
    this.send(`⛔ <b>불변식 위반</b> ${symbol}\n${detail}`);
  }

  notifyStatus(reports: readonly PairReport[]): void {
    const lines = reports.map((r) => {
      const price = r.lastPrice !== undefined ? ` @ ${fmt(r.lastPrice)}` : '';
      return `${r.status.symbol}${price}: ${r.status.state}, 포지션 ${r.openPositions}, 대기 ${r.pendingOrders}, 호가 ${r.liveQuotes}`;
    });
    this.send(`📊 <b>상태</b>\n${lines.join('\n')}`);
  }

  notifyStartup(strategy: string, pairs: readonly string[], sandbox: boolean): void {
    this.send(`🤖 <b>봇 시작</b>\n전략: ${strategy}\n페어: ${pairs.join(', ')}\n${sandbox ? '테스트넷' : '실거래'}`);
  }

  notifyShutdown(): void {
    this.send('🛑 <b>봇 종료</b>');
  }

  async flush(): Promise<void> {
    await this.tg?.flush();
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }
}
