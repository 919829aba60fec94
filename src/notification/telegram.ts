import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

const SEND_INTERVAL_MS = 1000;

/**
 * Telegram Bot API를 통한 메시지 전송
 * - 큐 + 초당 1건 제한 (rate limit 준수)
 * - 전송 실패 시 로그만 남김 (알림 실패로 봇이 죽으면 안 됨)
 */
export class TelegramNotifier {
  private readonly queue: string[] = [];
  private processing: Promise<void> | null = null;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly intervalMs: number = SEND_INTERVAL_MS,
  ) {}

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.processing = this.processQueue()
        .catch((err) => {
          log.error({ err }, 'Telegram queue stopped unexpectedly');
        })
        .finally(() => {
          this.processing = null;
        });
    }
  }

  /** 남은 메시지 전송 대기 (종료 시) */
  async flush(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private async processQueue(): Promise<void> {
    let msg = this.queue.shift();
    while (msg !== undefined) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      msg = this.queue.shift();
      // 초당 1건 제한
      if (msg !== undefined) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
