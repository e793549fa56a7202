import { describe, it, expect, vi } from 'vitest';
import { reportStartupFailure } from './index.js';
import { createLogger } from './logger.js';
import { OperatorAlertStream } from './alert/operator-alert.js';
import type { AlertSender } from './alert/operator-alert.js';

describe('reportStartupFailure', () => {
  it('시작 실패를 fatal로 기록하고 운영자 알림 전달까지 기다린다', async () => {
    const lines: string[] = [];
    const alert = new OperatorAlertStream('TestBot');
    const sender = vi.fn<AlertSender>().mockResolvedValue(undefined);
    alert.connect(sender);
    const logger = createLogger({
      level: 'info',
      destination: { write: (line: string) => void lines.push(line) },
      alert: { level: 'error', stream: alert },
    });

    await reportStartupFailure(new Error('listen EADDRINUSE: address already in use :::8080'), logger, alert);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 60,
      msg: 'GeminiRelay 시작 실패',
      err: { type: 'Error', message: 'listen EADDRINUSE: address already in use :::8080' },
    });
    expect(sender).toHaveBeenCalledTimes(1);
    expect(sender.mock.calls[0][0]).toContain('<b>Level:</b> FATAL');
  });

  it('알림 싱크가 없어도 기록한다', async () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info', destination: { write: (line: string) => void lines.push(line) } });

    await reportStartupFailure(new Error('boom'), logger, null);

    expect(JSON.parse(lines[0])).toMatchObject({ level: 60, err: { message: 'boom' } });
  });
});
