// Step 6: Telegram 웹훅 등록 (선택)
import * as p from '@clack/prompts';
import { Api, GrammyError } from 'grammy';
import type { Language, WizardState } from '../types.js';
import { t } from '../i18n.js';

export function validateWebhookUrl(lang: Language, value: string): string | undefined {
  if (!value) return undefined;
  try {
    if (new URL(value).protocol !== 'https:') return t(lang, 'webhookUrlInvalid');
  } catch {
    return t(lang, 'webhookUrlInvalid');
  }
  return undefined;
}

export async function registerWebhook(
  lang: Language,
  state: Pick<WizardState, 'credentials' | 'settings'>,
): Promise<void> {
  p.log.step(t(lang, 'webhookTitle'));

  const url = await p.text({
    message: t(lang, 'enterWebhookUrl'),
    defaultValue: '',
    placeholder: 'https://example.com/webhook',
    validate: (value) => validateWebhookUrl(lang, value),
  });
  if (p.isCancel(url)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  if (!url) {
    p.log.info(t(lang, 'webhookSkipped'));
    return;
  }

  try {
    await new Api(state.credentials.telegramBotToken, { timeoutSeconds: 15 }).setWebhook(url, {
      secret_token: state.settings.webhookSecret,
      allowed_updates: ['message', 'edited_message'],
      drop_pending_updates: true,
    });
    p.log.success(t(lang, 'webhookOk')(url));
  } catch (err) {
    const error = err instanceof GrammyError ? err.description : err instanceof Error ? err.message : String(err);
    p.log.error(t(lang, 'webhookFail')(error));
  }
}
