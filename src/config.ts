import fs from 'fs';
import path from 'path';
import { config as dotenvConfig } from 'dotenv';

// === 환경 변수 로드 ===

const PROJECT_ROOT = process.cwd();
const DEFAULT_ENV_PATH = path.resolve(PROJECT_ROOT, '.env');

let environmentLoaded = false;

/**
 * 로컬 개발용 .env 파일을 process.env 위에 한 번만 덮어씌운다.
 * 이미 설정된 시스템 환경 변수가 우선한다. 파일이 없으면 아무것도 하지 않는다.
 */
export function loadEnvironment(envPath = DEFAULT_ENV_PATH): boolean {
  if (environmentLoaded) return false;
  environmentLoaded = true;

  if (!fs.existsSync(envPath)) return false;

  const result = dotenvConfig({ path: envPath });
  if (result.error) throw result.error;
  return true;
}

// === 필수 키 조회 ===

export class ConfigMissingError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Configuration key '${key}' not found in environment.`);
    this.name = 'ConfigMissingError';
    this.key = key;
  }
}

/** 키가 없으면 사용 시점에 ConfigMissingError를 던진다 */
export function getConfig(key: string): string {
  const value = process.env[key];
  if (value === undefined) throw new ConfigMissingError(key);
  return value;
}

export function getOptionalConfig(key: string): string | undefined {
  return process.env[key];
}

export function getTelegramToken(): string {
  return getConfig('TELEGRAM_BOT_TOKEN');
}

export function getGeminiApiKey(): string {
  return getConfig('GEMINI_API_KEY');
}

export function getErrorChatId(): string {
  return getConfig('TELEGRAM_ERROR_CHAT_ID');
}

export function getGeminiConfigPath(): string {
  return path.resolve(PROJECT_ROOT, process.env.GEMINI_CONFIG_PATH || 'gemini-config.json');
}

// === 선택 설정 ===
// index.ts가 loadEnvironment() 이후에 읽을 수 있도록 함수로 노출한다.

export interface RuntimeSettings {
  botName: string;
  /** @ 없이. 비어 있으면 명령어의 @봇이름 접미사를 검사하지 않는다 */
  botUsername: string;
  geminiModel: string;
  geminiTimeoutMs: number;
  telegramTimeoutSeconds: number;
  webhookPort: number;
  webhookSecret: string;
  logLevel: string;
  logFile: string;
  alertLevel: string;
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  return {
    botName: env.BOT_NAME || 'GeminiRelay',
    botUsername: (env.TELEGRAM_BOT_USERNAME || '').replace(/^@/, ''),
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash-lite',
    geminiTimeoutMs: parseIntOr(env.GEMINI_TIMEOUT, 60_000),
    telegramTimeoutSeconds: parseIntOr(env.TELEGRAM_TIMEOUT, 30),
    webhookPort: parseIntOr(env.WEBHOOK_PORT, 8080),
    webhookSecret: env.WEBHOOK_SECRET || '',
    logLevel: env.LOG_LEVEL || 'info',
    logFile: path.resolve(PROJECT_ROOT, env.LOG_FILE || 'logs/app.log'),
    alertLevel: env.ALERT_LEVEL || 'error',
  };
}
