// Step 4: .env 파일 생성
import fs from 'fs';
import path from 'path';
import * as p from '@clack/prompts';
import type { WizardState } from '../types.js';
import { t } from '../i18n.js';

export function buildEnvContent(state: Omit<WizardState, 'language'>): string {
  const lines: string[] = [
    '# === 필수 설정 ===',
    `TELEGRAM_BOT_TOKEN=${state.credentials.telegramBotToken}`,
    `GEMINI_API_KEY=${state.credentials.geminiApiKey}`,
    `TELEGRAM_ERROR_CHAT_ID=${state.credentials.errorChatId}`,
    '',
    '# === 선택 설정 ===',
    `BOT_NAME=${state.settings.botName}`,
    `GEMINI_MODEL=${state.settings.geminiModel}`,
    `LOG_LEVEL=${state.settings.logLevel}`,
    `WEBHOOK_PORT=${state.settings.webhookPort}`,
    `WEBHOOK_SECRET=${state.settings.webhookSecret}`,
    '',
  ];
  return lines.join('\n');
}

export function maskValue(value: string): string {
  if (value.length <= 8) return '***';
  return value.slice(0, 8) + '***';
}

export async function writeEnvFile(
  state: WizardState,
  cwd: string,
): Promise<boolean> {
  p.log.step(t(state.language, 'envTitle'));

  const envPath = path.join(cwd, '.env');

  // 기존 .env 존재 시 확인 후 백업
  if (fs.existsSync(envPath)) {
    const overwrite = await p.confirm({
      message: t(state.language, 'envExists'),
    });

    if (p.isCancel(overwrite) || !overwrite) {
      p.log.warn(t(state.language, 'cancelled'));
      return false;
    }

    fs.copyFileSync(envPath, envPath + '.bak');
  }

  fs.writeFileSync(envPath, buildEnvContent(state), { encoding: 'utf-8', mode: 0o600 });

  p.note(
    [
      `TELEGRAM_BOT_TOKEN     = ${maskValue(state.credentials.telegramBotToken)}`,
      `GEMINI_API_KEY         = ${maskValue(state.credentials.geminiApiKey)}`,
      `TELEGRAM_ERROR_CHAT_ID = ${state.credentials.errorChatId}`,
      `BOT_NAME               = ${state.settings.botName}`,
      `GEMINI_MODEL           = ${state.settings.geminiModel}`,
      `LOG_LEVEL              = ${state.settings.logLevel}`,
      `WEBHOOK_PORT           = ${state.settings.webhookPort}`,
      `WEBHOOK_SECRET         = ${maskValue(state.settings.webhookSecret)}`,
    ].join('\n'),
    t(state.language, 'envSettingSummary'),
  );

  p.log.success(t(state.language, 'envCreated'));
  return true;
}
