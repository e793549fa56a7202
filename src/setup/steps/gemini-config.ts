// Step 5: gemini-config.json 생성 (없을 때만)
import fs from 'fs';
import path from 'path';
import * as p from '@clack/prompts';
import type { Language } from '../types.js';
import { t } from '../i18n.js';

export const GEMINI_CONFIG_FILE = 'gemini-config.json';

const DEFAULT_INSTRUCTION =
  'You are a helpful assistant answering questions in a Telegram chat. Reply concisely in the language of the question.';

export function buildGeminiConfig(systemInstruction: string, enableSearch: boolean): string {
  const config = {
    systemInstruction: { parts: [{ text: systemInstruction }] },
    tools: enableSearch ? [{ googleSearch: {} }] : [],
    generationConfig: { temperature: 0.7, maxOutputTokens: 2048 },
  };
  return JSON.stringify(config, null, 2) + '\n';
}

export async function writeGeminiConfig(lang: Language, cwd: string): Promise<void> {
  p.log.step(t(lang, 'geminiConfigTitle'));

  const configPath = path.join(cwd, GEMINI_CONFIG_FILE);
  if (fs.existsSync(configPath)) {
    p.log.info(t(lang, 'geminiConfigExists')(GEMINI_CONFIG_FILE));
    return;
  }

  const instruction = await p.text({
    message: t(lang, 'enterSystemInstruction'),
    defaultValue: DEFAULT_INSTRUCTION,
    placeholder: DEFAULT_INSTRUCTION.slice(0, 40) + '...',
  });
  if (p.isCancel(instruction)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  const enableSearch = await p.confirm({ message: t(lang, 'enableSearch'), initialValue: true });
  if (p.isCancel(enableSearch)) {
    p.cancel(t(lang, 'cancelled'));
    process.exit(0);
  }

  fs.writeFileSync(configPath, buildGeminiConfig(instruction, enableSearch), 'utf-8');
  p.log.success(t(lang, 'geminiConfigCreated')(GEMINI_CONFIG_FILE));
}
