// GeminiRelay TUI 설정 마법사 - 메인 오케스트레이터
import * as p from '@clack/prompts';
import { showBanner } from './ui/banner.js';
import { collectCredentials } from './steps/credentials.js';
import { collectSettings } from './steps/settings.js';
import { runHealthCheck } from './steps/health-check.js';
import { writeEnvFile } from './steps/env-writer.js';
import { writeGeminiConfig } from './steps/gemini-config.js';
import { registerWebhook } from './steps/webhook.js';
import { t } from './i18n.js';
import type { Language } from './types.js';

/** 시스템 로케일이 한국어면 한국어를 기본 선택으로 둔다 */
async function selectLanguage(): Promise<Language> {
  const locale = process.env.LC_ALL || process.env.LANG || '';
  const result = await p.select<Language>({
    message: '언어를 선택하세요 / Select language',
    initialValue: locale.startsWith('ko') ? ('ko' as const) : ('en' as const),
    options: [
      { value: 'ko' as const, label: '한국어' },
      { value: 'en' as const, label: 'English' },
    ],
  });

  if (p.isCancel(result)) {
    p.cancel('Setup cancelled.');
    process.exit(0);
  }
  return result;
}

async function main() {
  showBanner();

  const cwd = process.cwd();

  // Step 1: 언어 선택
  const language = await selectLanguage();
  p.log.success(t(language, 'welcome'));

  // Step 2: 인증 설정
  const credentials = await collectCredentials(language);

  // Step 3: 선택 설정
  const settings = await collectSettings(language);

  // Step 3.5: 건강 체크 (선택한 모델로 API 사전 검증)
  const healthOk = await runHealthCheck(language, credentials, settings.geminiModel);
  if (!healthOk) {
    p.outro(t(language, 'cancelled'));
    return;
  }

  // Step 4: .env 생성
  const envWritten = await writeEnvFile({ language, credentials, settings }, cwd);
  if (!envWritten) {
    p.outro(t(language, 'cancelled'));
    return;
  }

  // Step 5: Gemini 동작 설정
  await writeGeminiConfig(language, cwd);

  // Step 6: 웹훅 등록
  await registerWebhook(language, { credentials, settings });

  p.note(t(language, 'setupNext'));
  p.outro(t(language, 'done'));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
