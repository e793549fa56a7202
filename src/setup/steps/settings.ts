// Step 3: 선택 설정
import crypto from 'crypto';
import * as p from '@clack/prompts';
import type { Language, WizardState } from '../types.js';
import { t } from '../i18n.js';

export function validatePort(lang: Language, value: string): string | undefined {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) return t(lang, 'portInvalid');
  return undefined;
}

/** setWebhook secret_token 허용 문자: A-Z a-z 0-9 _ - (최대 256자) */
export function generateWebhookSecret(): string {
  return crypto.randomBytes(24).toString('base64url');
}

export async function collectSettings(
  lang: Language,
): Promise<WizardState['settings']> {
  p.log.step(t(lang, 'settingsTitle'));

  const botName = await p.text({
    message: t(lang, 'enterBotName'),
    defaultValue: 'GeminiRelay',
    placeholder: 'GeminiRelay',
  });
  if (p.isCancel(botName)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  const geminiModel = await p.select<string>({
    message: t(lang, 'selectModel'),
    options: [
      { value: 'gemini-2.5-flash-lite', label: 'Gemini 2.5 Flash-Lite' },
      { value: 'gemini-2.5-flash', label: 'Gemini 2.5 Flash' },
      { value: 'gemini-2.5-pro', label: 'Gemini 2.5 Pro' },
    ],
  });
  if (p.isCancel(geminiModel)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  const logLevel = await p.select<string>({
    message: t(lang, 'selectLogLevel'),
    options: [
      { value: 'info', label: 'info' },
      { value: 'debug', label: 'debug' },
      { value: 'warn', label: 'warn' },
      { value: 'error', label: 'error' },
    ],
  });
  if (p.isCancel(logLevel)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  const webhookPort = await p.text({
    message: t(lang, 'enterPort'),
    defaultValue: '8080',
    placeholder: '8080',
    validate: (value) => (value ? validatePort(lang, value) : undefined),
  });
  if (p.isCancel(webhookPort)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  return {
    botName,
    geminiModel,
    logLevel,
    webhookPort,
    webhookSecret: generateWebhookSecret(),
  };
}
