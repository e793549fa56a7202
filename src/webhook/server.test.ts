import { describe, it, expect, afterEach, vi } from 'vitest';
import { WebhookServer, isEmptyPayload } from './server.js';
import type { WebhookServerOpts } from './types.js';
import { ConfigMissingError } from '../config.js';
import { captureLogger, levelOf } from '../testing/capture-logger.js';

let server: WebhookServer | null = null;

afterEach(async () => {
  await server?.stop();
  server = null;
});

async function startServer(opts: Partial<WebhookServerOpts> = {}) {
  const { logger, records } = captureLogger();
  const onUpdate = vi.fn<WebhookServerOpts['onUpdate']>().mockResolvedValue(undefined);
  server = new WebhookServer({ port: 0, onUpdate, logger, ...opts });
  await server.start();
  return { url: `http://127.0.0.1:${server.port}/`, onUpdate, records };
}

describe('isEmptyPayload', () => {
  it('비어 있는 JSON 값을 판별한다', () => {
    for (const value of [null, undefined, false, 0, '', [], {}]) {
      expect(isEmptyPayload(value)).toBe(true);
    }
    for (const value of [{ update_id: 1 }, [1], 'x', 1, true]) {
      expect(isEmptyPayload(value)).toBe(false);
    }
  });
});

describe('WebhookServer', () => {
  it('POST가 아니면 405', async () => {
    const { url, onUpdate } = await startServer();
    const res = await fetch(url, { method: 'GET' });
    expect(res.status).toBe(405);
    expect(await res.text()).toBe('Method Not Allowed');
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('빈 본문이면 처리 없이 200 OK', async () => {
    const { url, onUpdate } = await startServer();
    const res = await fetch(url, { method: 'POST', body: '' });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('디코딩할 수 없거나 빈 JSON이면 200 OK', async () => {
    const { url, onUpdate } = await startServer();
    for (const body of ['{not json', '{}', '[]', 'null']) {
      const res = await fetch(url, { method: 'POST', body });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('OK');
    }
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('정상 페이로드를 onUpdate로 전달하고 200 OK', async () => {
    const { url, onUpdate } = await startServer();
    const payload = { update_id: 1, message: { chat: { id: 1 }, text: 'hi' } };
    const res = await fetch(url, { method: 'POST', body: JSON.stringify(payload) });

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
    expect(onUpdate).toHaveBeenCalledWith(payload);
  });

  it('1MiB를 넘는 본문은 413', async () => {
    const { url, onUpdate } = await startServer();
    const body = JSON.stringify({ update_id: 1, padding: 'x'.repeat(1024 * 1024) });

    const res = await fetch(url, { method: 'POST', body });
    expect(res.status).toBe(413);
    expect(await res.text()).toBe('Payload Too Large');
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('처리 중 예외는 오류 정보를 기록하고 200으로 응답한다', async () => {
    const onUpdate = vi.fn<WebhookServerOpts['onUpdate']>().mockRejectedValue(new ConfigMissingError('GEMINI_API_KEY'));
    const { url, records } = await startServer({ onUpdate });

    const res = await fetch(url, { method: 'POST', body: '{"update_id":1}' });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('An error occurred, log reported.');

    const errors = records.filter((r) => r.level === levelOf('error'));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      errorClass: 'ConfigMissingError',
      message: "Configuration key 'GEMINI_API_KEY' not found in environment.",
    });
    expect(String(errors[0].stack)).toContain('ConfigMissingError');
  });

  it('시크릿 토큰이 설정되면 헤더가 일치해야 한다', async () => {
    const { url, onUpdate } = await startServer({ secretToken: 'test-secret' });
    const body = '{"update_id":1}';

    const denied = await fetch(url, { method: 'POST', body });
    expect(denied.status).toBe(401);

    const wrong = await fetch(url, {
      method: 'POST',
      body,
      headers: { 'X-Telegram-Bot-Api-Secret-Token': 'other' },
    });
    expect(wrong.status).toBe(401);

    const allowed = await fetch(url, {
      method: 'POST',
      body,
      headers: { 'X-Telegram-Bot-Api-Secret-Token': 'test-secret' },
    });
    expect(allowed.status).toBe(200);
    expect(onUpdate).toHaveBeenCalledTimes(1);
  });
});
