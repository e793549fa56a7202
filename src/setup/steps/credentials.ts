// Step 2: 인증 설정
import * as p from '@clack/prompts';
import type { Language, WizardState } from '../types.js';
import { t } from '../i18n.js';

// Telegram Bot Token: 숫자:영문숫자+하이픈+언더스코어
export const TELEGRAM_TOKEN_PATTERN = /^\d+:[A-Za-z0-9_-]+$/;
// 개인 채팅은 양수, 그룹/채널은 -100 접두사
export const CHAT_ID_PATTERN = /^-?\d+$/;

export function validateTelegramToken(lang: Language, value: string): string | undefined {
  if (!value) return t(lang, 'telegramTokenRequired');
  if (!TELEGRAM_TOKEN_PATTERN.test(value)) return t(lang, 'telegramTokenInvalid');
  return undefined;
}

export function validateErrorChatId(lang: Language, value: string): string | undefined {
  if (!value) return t(lang, 'errorChatIdRequired');
  if (!CHAT_ID_PATTERN.test(value.trim())) return t(lang, 'errorChatIdInvalid');
  return undefined;
}

function exitIfCancelled<T>(lang: Language, value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }
  return value;
}

export async function collectCredentials(
  lang: Language,
): Promise<WizardState['credentials']> {
  p.log.step(t(lang, 'credentialsTitle'));

  const telegramBotToken = exitIfCancelled(
    lang,
    await p.password({
      message: t(lang, 'enterTelegramToken'),
      validate: (value) => validateTelegramToken(lang, value),
    }),
  );

  const geminiApiKey = exitIfCancelled(
    lang,
    await p.password({
      message: t(lang, 'enterGeminiKey'),
      validate(value) {
        if (!value.trim()) return t(lang, 'geminiKeyRequired');
      },
    }),
  );

  const errorChatId = exitIfCancelled(
    lang,
    await p.text({
      message: t(lang, 'enterErrorChatId'),
      placeholder: '-1001234567890',
      validate: (value) => validateErrorChatId(lang, value),
    }),
  );

  return { telegramBotToken, geminiApiKey: geminiApiKey.trim(), errorChatId: errorChatId.trim() };
}
