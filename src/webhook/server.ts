import http from 'http';
import type pino from 'pino';

import { ERROR_BODY, OK_BODY } from './types.js';
import type { WebhookServerOpts } from './types.js';

const MAX_BODY_SIZE = 1024 * 1024; // 1MB
const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

class BodyTooLargeError extends Error {
  constructor() {
    super('Request body too large');
    this.name = 'BodyTooLargeError';
  }
}

/** 처리할 내용이 없는 JSON 값: null, false, 0, '', [], {} */
export function isEmptyPayload(data: unknown): boolean {
  if (data === null || data === undefined || data === false || data === 0 || data === '') return true;
  if (Array.isArray(data)) return data.length === 0;
  if (typeof data === 'object') return Object.keys(data).length === 0;
  return false;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Telegram 웹훅 수신 서버.
 * 요청이 한 번 본문 처리 단계에 들어가면 내부 오류가 나도 200으로 응답해 재전송을 막는다.
 */
export class WebhookServer {
  private server: http.Server | null = null;
  private opts: WebhookServerOpts;
  private logger: pino.Logger;

  constructor(opts: WebhookServerOpts & { logger: pino.Logger }) {
    this.opts = opts;
    this.logger = opts.logger;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((err) => {
          this.logger.error({ err }, '웹훅 응답 처리 오류');
          if (!res.headersSent) this.sendText(res, 200, ERROR_BODY);
        });
      });
      this.server.once('error', reject);
      this.server.listen(this.opts.port, () => {
        this.logger.info({ port: this.port }, '웹훅 서버 시작');
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        const server = this.server;
        this.server = null;
        server.close(() => {
          this.logger.info('웹훅 서버 중지');
          resolve();
        });
        server.closeIdleConnections();
      } else {
        resolve();
      }
    });
  }

  /** 실제로 바인딩된 포트 (listen 전에는 설정값) */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') return address.port;
    return this.opts.port;
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    // POST 메소드만 허용
    if (req.method !== 'POST') {
      this.logger.info({ method: req.method }, 'Method Not Allowed');
      this.sendText(res, 405, 'Method Not Allowed');
      return;
    }

    // 시크릿 토큰 검증 (setWebhook의 secret_token)
    if (this.opts.secretToken && req.headers[SECRET_HEADER] !== this.opts.secretToken) {
      this.logger.warn({ ip: req.socket.remoteAddress }, '웹훅 시크릿 토큰 불일치');
      this.sendText(res, 401, 'Unauthorized');
      return;
    }

    let raw: string;
    try {
      raw = await this.readBody(req);
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        this.logger.warn('웹훅 본문 크기 초과');
        this.sendText(res, 413, 'Payload Too Large');
        return;
      }
      throw err;
    }

    const data = parseJson(raw);
    if (isEmptyPayload(data)) {
      this.logger.info('Empty payload received');
      this.sendText(res, 200, OK_BODY);
      return;
    }

    try {
      await this.opts.onUpdate(data);
      this.sendText(res, 200, OK_BODY);
    } catch (err) {
      this.logger.error(
        {
          errorClass: err instanceof Error ? err.name : typeof err,
          message: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        },
        '웹훅 처리 중 치명적 오류',
      );
      // Telegram의 반복 재전송을 막기 위해 200으로 응답
      this.sendText(res, 200, ERROR_BODY);
    }
  }

  private readBody(req: http.IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        if (tooLarge) return;
        size += chunk.length;
        if (size > MAX_BODY_SIZE) {
          tooLarge = true;
          reject(new BodyTooLargeError());
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (!tooLarge) resolve(Buffer.concat(chunks).toString('utf-8'));
      });

      req.on('error', reject);
    });
  }

  private sendText(res: http.ServerResponse, status: number, body: string): void {
    res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end(body);
  }
}
