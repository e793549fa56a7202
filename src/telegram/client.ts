import { Api, GrammyError, HttpError } from 'grammy';
import type { ParseMode } from 'grammy/types';
import type pino from 'pino';

// Telegram 메시지 최대 길이
const MAX_LENGTH = 4096;

/** grammy Api 중 이 클라이언트가 쓰는 부분 */
export interface SendMessageApi {
  sendMessage(
    chatId: number | string,
    text: string,
    other?: { parse_mode?: ParseMode; disable_notification?: boolean },
  ): Promise<{ message_id: number }>;
}

export type DeliveryResult =
  | { ok: true; messageId: number }
  | { ok: false; reason: 'no-token' }
  | { ok: false; reason: 'api'; status: number; detail: string }
  | { ok: false; reason: 'transport'; detail: string };

export interface TelegramClientOpts {
  /** 비어 있으면 전송 시 네트워크 호출 없이 실패한다 */
  token: string;
  logger: pino.Logger;
  /** 요청 타임아웃 (초) */
  timeoutSeconds?: number;
  /** 테스트용 Api 구현. 없으면 token으로 grammy Api를 만든다 (token이 비면 무시) */
  api?: SendMessageApi;
}

/** 4096자를 넘으면 잘라 '…'를 붙인다. 서로게이트 쌍은 나누지 않는다 */
export function truncateMessage(text: string): string {
  if (text.length <= MAX_LENGTH) return text;
  let end = MAX_LENGTH - 1;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return text.slice(0, end) + '…';
}

/**
 * Telegram Bot API 발신 클라이언트.
 * 모든 결과는 DeliveryResult로 반환되며 예외를 던지지 않는다.
 */
export class TelegramClient {
  private api: SendMessageApi | null;
  private logger: pino.Logger;

  constructor(opts: TelegramClientOpts) {
    this.logger = opts.logger;
    if (!opts.token) {
      this.api = null;
    } else {
      this.api = opts.api ?? new Api(opts.token, { timeoutSeconds: opts.timeoutSeconds ?? 30 });
    }
  }

  async send(chatId: string, text: string, parseMode: ParseMode = 'Markdown'): Promise<DeliveryResult> {
    if (!this.api) {
      this.logger.error({ chatId }, 'Telegram 토큰이 없어 메시지를 보낼 수 없습니다');
      return { ok: false, reason: 'no-token' };
    }

    const body = truncateMessage(text);
    this.logger.info({ chatId, length: body.length }, 'Telegram 메시지 전송');

    try {
      const message = await this.api.sendMessage(chatId, body, {
        parse_mode: parseMode,
        disable_notification: false,
      });
      this.logger.info({ chatId, messageId: message.message_id }, 'Telegram 메시지 전송 완료');
      return { ok: true, messageId: message.message_id };
    } catch (err) {
      if (err instanceof GrammyError) {
        this.logger.error(
          { chatId, httpCode: err.error_code, description: err.description },
          'Telegram API 오류 응답',
        );
        return { ok: false, reason: 'api', status: err.error_code, detail: err.description };
      }
      if (err instanceof HttpError) {
        const cause = err.error instanceof Error ? err.error.message : String(err.error);
        this.logger.error({ chatId, err: err.message, cause }, 'Telegram 네트워크 오류');
        return { ok: false, reason: 'transport', detail: `${err.message} (${cause})` };
      }
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error({ chatId, err: detail }, 'Telegram 메시지 전송 실패');
      return { ok: false, reason: 'transport', detail };
    }
  }
}
