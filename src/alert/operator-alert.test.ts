import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { OperatorAlertStream, SKIP_ALERT, escapeHtml, formatAlert, truncateEscaped } from './operator-alert.js';
import { TelegramClient } from '../telegram/client.js';
import type { SendMessageApi } from '../telegram/client.js';
import type { AlertSender } from './operator-alert.js';

function alertLogger(stream: OperatorAlertStream, lines: string[] = []): pino.Logger {
  return pino(
    { level: 'debug' },
    pino.multistream([
      { level: 'debug', stream: { write: (line: string) => void lines.push(line) } },
      { level: 'error', stream },
    ]),
  );
}

describe('escapeHtml', () => {
  it('HTML 특수문자를 이스케이프한다', () => {
    expect(escapeHtml('<b>a & b</b>')).toBe('&lt;b&gt;a &amp; b&lt;/b&gt;');
  });
});

describe('formatAlert', () => {
  it('레벨, 시각, 메시지, 컨텍스트를 담는다', () => {
    const text = formatAlert('TestBot', {
      level: 50,
      time: Date.UTC(2026, 0, 2, 3, 4, 5),
      msg: 'fail <x>',
      pid: 1,
      hostname: 'host',
      chatId: '123',
    });
    expect(text).toBe(
      [
        '🚨 <b>TestBot 오류 알림</b> 🚨',
        '<b>Level:</b> ERROR',
        '<b>Time:</b> 2026-01-02T03:04:05.000Z',
        '<b>Message:</b> fail &lt;x&gt;',
        '<b>Context:</b>',
        '<pre>{\n  "chatId": "123"\n}</pre>',
      ].join('\n'),
    );
  });

  it('긴 컨텍스트를 잘라 Telegram 제한 안에 맞춘다', () => {
    const text = formatAlert('TestBot', { level: 60, time: 0, msg: 'big', blob: 'x'.repeat(10_000) });
    expect(text.length).toBeLessThanOrEqual(4096);
    expect(text.startsWith('🚨 <b>TestBot 오류 알림</b> 🚨\n<b>Level:</b> FATAL')).toBe(true);
    expect(text.endsWith('...</pre>')).toBe(true);
  });

  it('이스케이프로 길어진 메시지도 엔티티를 깨지 않고 제한 안에 맞춘다', () => {
    const text = formatAlert('TestBot', { level: 50, time: 0, msg: 'a<b'.repeat(500) + '&'.repeat(400) });
    expect(text.length).toBeLessThanOrEqual(4096);
    expect(text.startsWith('🚨 <b>TestBot 오류 알림</b> 🚨\n<b>Level:</b> ERROR')).toBe(true);
    expect(text).not.toContain('<b>Context:</b>');
    expect(text.endsWith('&amp;…')).toBe(true);
    expect(text).not.toMatch(/&(?!amp;|lt;|gt;)/);
  });
});

describe('truncateEscaped', () => {
  it('제한 이하면 그대로 둔다', () => {
    expect(truncateEscaped('a&amp;b', 7)).toBe('a&amp;b');
  });

  it('엔티티 중간에서 자르지 않는다', () => {
    expect(truncateEscaped('ab&amp;cd', 6)).toBe('ab…');
    expect(truncateEscaped('ab&amp;cd', 8)).toBe('ab&amp;…');
  });

  it('서로게이트 쌍을 나누지 않는다', () => {
    expect(truncateEscaped('a😀bc', 3)).toBe('a…');
  });
});

describe('OperatorAlertStream', () => {
  it('임계 레벨 이상의 레코드만 운영자 채팅으로 전달한다', async () => {
    const stream = new OperatorAlertStream('TestBot');
    const sender = vi.fn<AlertSender>().mockResolvedValue(undefined);
    stream.connect(sender);
    const logger = alertLogger(stream);

    logger.info('just info');
    logger.warn('a warning');
    logger.error({ chatId: '1' }, 'broken');
    logger.fatal('down');
    await stream.flush();

    expect(sender).toHaveBeenCalledTimes(2);
    expect(sender.mock.calls[0][0]).toContain('<b>Message:</b> broken');
    expect(sender.mock.calls[1][0]).toContain('<b>Level:</b> FATAL');
  });

  it('연결 전 레코드와 skipAlert 레코드는 전달하지 않는다', async () => {
    const stream = new OperatorAlertStream('TestBot');
    const logger = alertLogger(stream);
    logger.error('before connect');

    const sender = vi.fn<AlertSender>().mockResolvedValue(undefined);
    stream.connect(sender);
    logger.child(SKIP_ALERT).error('from alert client');
    await stream.flush();

    expect(sender).not.toHaveBeenCalled();
  });

  it('전송 실패는 예외 없이 버려지고 다른 싱크 기록은 계속된다', async () => {
    const stream = new OperatorAlertStream('TestBot');
    stream.connect(() => Promise.reject(new Error('telegram down')));
    const lines: string[] = [];
    const logger = alertLogger(stream, lines);

    logger.error('first');
    logger.error('second');
    await expect(stream.flush()).resolves.toBeUndefined();

    expect(lines).toHaveLength(2);
  });

  it('알림 클라이언트의 실패 로그가 다시 알림을 만들지 않는다', async () => {
    const stream = new OperatorAlertStream('TestBot');
    const lines: string[] = [];
    const logger = alertLogger(stream, lines);

    const sendMessage = vi.fn<SendMessageApi['sendMessage']>().mockRejectedValue(new Error('unreachable'));
    const alertClient = new TelegramClient({
      token: 'test-token',
      api: { sendMessage },
      logger: logger.child({ component: 'alert', ...SKIP_ALERT }),
    });
    stream.connect((text) => alertClient.send('-100', text, 'HTML'));

    logger.error('original failure');
    await stream.flush();

    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage.mock.calls[0][2]).toEqual({ parse_mode: 'HTML', disable_notification: false });
    // 원래 레코드 + 알림 클라이언트의 전송/실패 기록
    const messages = lines.map((line) => JSON.parse(line).msg);
    expect(messages).toEqual(['original failure', 'Telegram 메시지 전송', 'Telegram 메시지 전송 실패']);
  });
});
