import type pino from 'pino';

import { GeminiConfigLoader } from './ai/gemini-config.js';
import { OperatorAlertStream, SKIP_ALERT } from './alert/operator-alert.js';
import { getGeminiConfigPath, getOptionalConfig, loadEnvironment, readSettings } from './config.js';
import type { RuntimeSettings } from './config.js';
import { createLogger } from './logger.js';
import { createUpdateProcessor } from './relay.js';
import { TelegramClient } from './telegram/client.js';
import { WebhookServer } from './webhook/server.js';

// === 메인 ===

async function main(): Promise<void> {
  loadEnvironment();
  const settings = readSettings();

  // 운영자 알림: 토큰과 오류 채팅 ID가 모두 있을 때만 활성화
  const token = getOptionalConfig('TELEGRAM_BOT_TOKEN') ?? '';
  const errorChatId = getOptionalConfig('TELEGRAM_ERROR_CHAT_ID') ?? '';
  const alertStream = token && errorChatId ? new OperatorAlertStream(settings.botName) : null;

  const logger = createLogger({
    level: settings.logLevel,
    filePath: settings.logFile,
    alert: alertStream ? { level: settings.alertLevel, stream: alertStream } : undefined,
  });

  if (alertStream) {
    // 알림 전송용 클라이언트의 로그는 다시 알림으로 전달되지 않는다
    const alertClient = new TelegramClient({
      token,
      timeoutSeconds: settings.telegramTimeoutSeconds,
      logger: logger.child({ component: 'alert', ...SKIP_ALERT }),
    });
    alertStream.connect((text) => alertClient.send(errorChatId, text, 'HTML'));
  } else {
    logger.warn('TELEGRAM_BOT_TOKEN 또는 TELEGRAM_ERROR_CHAT_ID 미설정, 운영자 알림 비활성');
  }

  try {
    await startServer(settings, logger, alertStream);
  } catch (err) {
    await reportStartupFailure(err, logger, alertStream);
    process.exit(1);
  }
}

/** 로거가 만들어진 뒤의 시작 실패는 fatal로 남기고 운영자 알림 전달을 기다린다 */
export async function reportStartupFailure(
  err: unknown,
  logger: pino.Logger,
  alertStream: OperatorAlertStream | null,
): Promise<void> {
  logger.fatal({ err }, 'GeminiRelay 시작 실패');
  await alertStream?.flush();
}

async function startServer(
  settings: RuntimeSettings,
  logger: pino.Logger,
  alertStream: OperatorAlertStream | null,
): Promise<void> {
  const configLoader = new GeminiConfigLoader(
    getGeminiConfigPath(),
    logger.child({ component: 'gemini-config' }),
  );

  const server = new WebhookServer({
    port: settings.webhookPort,
    secretToken: settings.webhookSecret || undefined,
    logger: logger.child({ component: 'webhook' }),
    onUpdate: createUpdateProcessor({ settings, configLoader, logger }),
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, '종료 신호 수신');
    await server.stop();
    await alertStream?.flush();
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start();
  logger.info({ botName: settings.botName, model: settings.geminiModel }, 'GeminiRelay 실행 중');
}

// 직접 실행인 경우에만 main() 호출
const isDirectRun =
  process.argv[1] &&
  new URL(import.meta.url).pathname === new URL(`file://${process.argv[1]}`).pathname;

if (isDirectRun) {
  main().catch((err) => {
    // 로거 생성 전에 실패한 경우
    console.error('GeminiRelay 시작 실패', err);
    process.exit(1);
  });
}
