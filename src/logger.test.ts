import { describe, it, expect, vi } from 'vitest';
import { createLogger, toLevel } from './logger.js';
import { OperatorAlertStream } from './alert/operator-alert.js';
import type { AlertSender } from './alert/operator-alert.js';

function memoryDestination() {
  const lines: string[] = [];
  return { lines, destination: { write: (line: string) => void lines.push(line) } };
}

describe('toLevel', () => {
  it('알려진 레벨은 그대로, 모르는 값은 기본값으로', () => {
    expect(toLevel('debug', 'info')).toBe('debug');
    expect(toLevel('verbose', 'info')).toBe('info');
    expect(toLevel('', 'error')).toBe('error');
  });
});

describe('createLogger', () => {
  it('설정한 레벨 이상만 기록한다', () => {
    const { lines, destination } = memoryDestination();
    const logger = createLogger({ level: 'info', destination });

    logger.debug('hidden');
    logger.info({ chatId: '1' }, 'shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 30, msg: 'shown', chatId: '1' });
  });

  it('alert 싱크에는 임계 레벨 이상만 전달된다', async () => {
    const { lines, destination } = memoryDestination();
    const alert = new OperatorAlertStream('TestBot');
    const sender = vi.fn<AlertSender>().mockResolvedValue(undefined);
    alert.connect(sender);

    const logger = createLogger({ level: 'debug', destination, alert: { level: 'error', stream: alert } });
    logger.warn('warned');
    logger.error('failed');
    await alert.flush();

    expect(lines).toHaveLength(2);
    expect(sender).toHaveBeenCalledTimes(1);
    expect(sender.mock.calls[0][0]).toContain('<b>Message:</b> failed');
  });
});
