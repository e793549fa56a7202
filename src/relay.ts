import type pino from 'pino';

import { GeminiClient } from './ai/gemini.js';
import type { BehaviorSource } from './ai/gemini.js';
import { BotHandler } from './bot/handler.js';
import { getGeminiApiKey, getOptionalConfig } from './config.js';
import type { RuntimeSettings } from './config.js';
import type { SendMessageApi } from './telegram/client.js';
import { TelegramClient } from './telegram/client.js';
import { isValidUpdate, normalizeUpdate } from './telegram/update.js';

export interface UpdateProcessorDeps {
  settings: Pick<RuntimeSettings, 'botName' | 'botUsername' | 'geminiModel' | 'geminiTimeoutMs' | 'telegramTimeoutSeconds'>;
  configLoader: BehaviorSource;
  logger: pino.Logger;
  /** 테스트용 교체 지점 */
  fetch?: typeof fetch;
  telegramApi?: SendMessageApi;
}

/**
 * 웹훅 페이로드 한 건을 처리하는 함수를 만든다.
 * 클라이언트는 요청마다 새로 구성하고, 키가 없으면 ConfigMissingError가 경계까지 전파된다.
 */
export function createUpdateProcessor(deps: UpdateProcessorDeps): (payload: unknown) => Promise<void> {
  const { settings, configLoader, logger } = deps;

  return async (payload) => {
    const update = normalizeUpdate(payload);
    if (!isValidUpdate(update)) {
      logger.info('텍스트가 없거나 유효하지 않은 업데이트 수신');
      return;
    }

    logger.info({ chatId: update.chatId, textLength: update.text.length }, '메시지 처리 시작');

    const telegram = new TelegramClient({
      token: getOptionalConfig('TELEGRAM_BOT_TOKEN') ?? '',
      timeoutSeconds: settings.telegramTimeoutSeconds,
      logger: logger.child({ component: 'telegram' }),
      api: deps.telegramApi,
    });

    const gemini = new GeminiClient({
      apiKey: getGeminiApiKey(),
      model: settings.geminiModel,
      timeoutMs: settings.geminiTimeoutMs,
      configLoader,
      logger: logger.child({ component: 'gemini' }),
      fetch: deps.fetch,
    });

    const handler = new BotHandler({
      botName: settings.botName,
      botUsername: settings.botUsername,
      completer: gemini,
      messenger: telegram,
      logger: logger.child({ component: 'bot' }),
    });

    await handler.handle(update);
  };
}
