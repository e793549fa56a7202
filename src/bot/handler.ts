import type pino from 'pino';

import type { GenerationFailure, GenerationResult } from '../ai/gemini.js';
import { describeFailure } from '../ai/gemini.js';
import type { DeliveryResult } from '../telegram/client.js';
import type { Update } from '../telegram/update.js';
import { isValidUpdate } from '../telegram/update.js';
import {
  ERROR_MESSAGE,
  HELP_MESSAGE,
  NO_CONTENT_MESSAGE,
  NOT_CONFIGURED_MESSAGE,
  startMessage,
} from './messages.js';

const COMMAND_PREFIX = '/';

/** 프롬프트로 답변을 생성하는 쪽 (GeminiClient) */
export interface Completer {
  generate(prompt: string): Promise<GenerationResult>;
}

/** 채팅으로 메시지를 보내는 쪽 (TelegramClient) */
export interface Messenger {
  send(chatId: string, text: string): Promise<DeliveryResult>;
}

export interface BotHandlerOpts {
  botName: string;
  /** 그룹에서 다른 봇을 지정한 명령어를 걸러낼 때 쓴다 */
  botUsername?: string;
  completer: Completer;
  messenger: Messenger;
  logger: pino.Logger;
}

function commandToken(text: string): string {
  return text.split(/\s+/, 1)[0].slice(COMMAND_PREFIX.length);
}

/**
 * "/start@MyBot args" → "start". 명령어가 아니면 null.
 * 인자와 @봇이름 접미사는 무시한다.
 */
export function parseCommand(text: string): string | null {
  if (!text.startsWith(COMMAND_PREFIX)) return null;
  return commandToken(text).split('@', 1)[0].toLowerCase();
}

/** "/start@OtherBot"처럼 다른 봇을 지정한 명령어인지. username을 모르면 false */
export function isAddressedElsewhere(text: string, username: string | undefined): boolean {
  if (!username || !text.startsWith(COMMAND_PREFIX)) return false;
  const token = commandToken(text);
  const at = token.indexOf('@');
  if (at === -1) return false;
  return token.slice(at + 1).toLowerCase() !== username.toLowerCase();
}

/** 실패 종류별 사용자 안내 문구. 내부 오류 내용은 채팅에 노출하지 않는다 */
export function fallbackText(result: GenerationFailure): string {
  switch (result.kind) {
    case 'not-configured':
      return NOT_CONFIGURED_MESSAGE;
    case 'no-content':
      return NO_CONTENT_MESSAGE;
    case 'transport':
    case 'remote-error':
      return ERROR_MESSAGE;
  }
}

/**
 * 업데이트 한 건을 처리한다: 검증 → 명령어 분기 → Gemini 질의 → 응답 전송.
 * 응답은 최대 한 번만 전송되며, 전송 실패는 로그로만 남는다.
 */
export class BotHandler {
  private opts: BotHandlerOpts;
  private logger: pino.Logger;

  constructor(opts: BotHandlerOpts) {
    this.opts = opts;
    this.logger = opts.logger;
  }

  async handle(update: Update): Promise<boolean> {
    if (!isValidUpdate(update)) {
      this.logger.info('유효하지 않거나 텍스트가 없는 업데이트, 무시');
      return true;
    }

    if (isAddressedElsewhere(update.text, this.opts.botUsername)) {
      this.logger.info({ chatId: update.chatId }, '다른 봇을 지정한 명령어, 무시');
      return true;
    }

    this.logger.info({ chatId: update.chatId, text: update.text }, '메시지 처리');

    let responseText = '';

    if (update.text.startsWith(COMMAND_PREFIX)) {
      responseText = this.handleCommand(update);
    }

    // 인식하지 못한 명령어는 접두사를 포함한 원문 그대로 질의로 넘긴다
    if (!responseText) {
      responseText = await this.handleInquiry(update);
    }

    if (responseText) {
      const delivery = await this.opts.messenger.send(update.chatId, responseText);
      if (!delivery.ok) {
        this.logger.warn({ chatId: update.chatId, reason: delivery.reason }, '응답 전송 실패');
      }
    }

    return true;
  }

  private handleCommand(update: Update): string {
    switch (parseCommand(update.text)) {
      case 'start':
        return startMessage(this.opts.botName, update.userId);
      case 'help':
        return HELP_MESSAGE;
      default:
        return '';
    }
  }

  private async handleInquiry(update: Update): Promise<string> {
    try {
      const result = await this.opts.completer.generate(update.text);
      if (result.ok) return result.text;

      this.logger.warn({ chatId: update.chatId, kind: result.kind }, describeFailure(result));
      return fallbackText(result);
    } catch (err) {
      this.logger.error(
        { chatId: update.chatId, err: err instanceof Error ? err.message : String(err) },
        'Gemini 처리 중 예기치 않은 오류',
      );
      return ERROR_MESSAGE;
    }
  }
}
