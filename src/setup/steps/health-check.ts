// 인증 정보 사전 검증 (Telegram Bot Token + Gemini API Key)
import * as p from '@clack/prompts';
import { Api, GrammyError } from 'grammy';
import { z } from 'zod';
import type { Language, WizardState } from '../types.js';
import { t } from '../i18n.js';

const errorBodySchema = z.object({ error: z.object({ message: z.string() }) });

interface CheckResult {
  ok: boolean;
  name?: string;
  error?: string;
}

/** Telegram Bot Token 검증 - getMe 호출 */
async function validateTelegram(token: string): Promise<CheckResult> {
  try {
    const me = await new Api(token, { timeoutSeconds: 10 }).getMe();
    return { ok: true, name: `@${me.username}` };
  } catch (err) {
    if (err instanceof GrammyError) return { ok: false, error: err.description };
    return { ok: false, error: err instanceof Error ? err.message : 'Network error' };
  }
}

/** Gemini API Key 검증 - 모델 메타데이터 조회 (토큰 소모 없음) */
async function validateGemini(apiKey: string, model: string): Promise<CheckResult> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}?key=${encodeURIComponent(apiKey)}`;

  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(15_000) });
    if (res.ok) {
      return { ok: true, name: model };
    }

    const data = errorBodySchema.safeParse(await res.json().catch(() => null));
    return { ok: false, error: data.success ? data.data.error.message : `HTTP ${res.status}` };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : 'Network error' };
  }
}

/** 건강 체크 실행 - 인증 정보 수집 직후 호출 */
export async function runHealthCheck(
  lang: Language,
  credentials: WizardState['credentials'],
  model: string,
): Promise<boolean> {
  p.log.step(t(lang, 'healthCheckTitle'));

  const s = p.spinner();
  s.start(t(lang, 'healthCheckRunning'));

  const [telegram, gemini] = await Promise.all([
    validateTelegram(credentials.telegramBotToken),
    validateGemini(credentials.geminiApiKey, model),
  ]);

  s.stop(t(lang, 'healthCheckDone'));

  if (telegram.ok) {
    p.log.success(t(lang, 'healthCheckTelegramOk')(telegram.name ?? 'Bot'));
  } else {
    p.log.error(t(lang, 'healthCheckTelegramFail')(telegram.error ?? 'Unknown'));
  }

  if (gemini.ok) {
    p.log.success(t(lang, 'healthCheckGeminiOk')(gemini.name ?? model));
  } else {
    p.log.error(t(lang, 'healthCheckGeminiFail')(gemini.error ?? 'Unknown'));
  }

  // 하나라도 실패 시 계속 진행할지 확인
  if (!telegram.ok || !gemini.ok) {
    const proceed = await p.confirm({
      message: t(lang, 'healthCheckContinue'),
    });

    if (p.isCancel(proceed) || !proceed) {
      return false;
    }
  }

  return true;
}
