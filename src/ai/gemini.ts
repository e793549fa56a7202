import type pino from 'pino';
import { z } from 'zod';

import type { GeminiBehavior } from './gemini-config.js';

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; kind: 'not-configured' }
  | { ok: false; kind: 'transport'; status?: number; detail: string }
  | { ok: false; kind: 'remote-error'; detail: string }
  | { ok: false; kind: 'no-content'; detail?: string };

export type GenerationFailure = Extract<GenerationResult, { ok: false }>;

/** 동작 설정 공급원 (GeminiConfigLoader). null이면 미설정 */
export interface BehaviorSource {
  load(): Promise<GeminiBehavior | null>;
}

export interface GeminiClientOpts {
  apiKey: string;
  model: string;
  configLoader: BehaviorSource;
  logger: pino.Logger;
  /** 요청 타임아웃 (기본 60초) */
  timeoutMs?: number;
  /** 테스트에서 교체 가능한 fetch 구현 */
  fetch?: typeof fetch;
}

const errorEnvelopeSchema = z.object({ error: z.unknown().optional() }).passthrough();

const responseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() })
              .optional(),
            finishReason: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const remoteErrorSchema = z.object({ message: z.string() }).passthrough();

type GeminiResponse = z.infer<typeof responseSchema>;

function remoteErrorMessage(error: unknown): string {
  const parsed = remoteErrorSchema.safeParse(error);
  return parsed.success ? parsed.data.message : 'Unknown API Error';
}

function extractText(body: GeminiResponse): string | null {
  const text = body.candidates?.[0]?.content?.parts?.[0]?.text;
  return text ? text : null;
}

/** 로그용 실패 설명. transport 실패에는 상태 코드가 포함된다 */
export function describeFailure(result: GenerationFailure): string {
  switch (result.kind) {
    case 'not-configured':
      return 'AI service is not configured';
    case 'transport':
      return `AI service request failed (Code: ${result.status ?? 'none'}): ${result.detail}`;
    case 'remote-error':
      return `AI service reported an issue: ${result.detail}`;
    case 'no-content':
      return `AI returned no valid response${result.detail ? ` (${result.detail})` : ''}`;
  }
}

/**
 * Gemini generateContent 클라이언트.
 * 모든 실패는 GenerationResult로 반환되며 예외를 밖으로 던지지 않는다.
 */
export class GeminiClient {
  private opts: GeminiClientOpts;
  private logger: pino.Logger;
  private fetchFn: typeof fetch;

  constructor(opts: GeminiClientOpts) {
    this.opts = opts;
    this.logger = opts.logger;
    this.fetchFn = opts.fetch ?? fetch;
  }

  async generate(prompt: string): Promise<GenerationResult> {
    const behavior = await this.opts.configLoader.load();
    if (!behavior) {
      return { ok: false, kind: 'not-configured' };
    }

    const url = `${GEMINI_API_BASE}/models/${this.opts.model}:generateContent?key=${encodeURIComponent(this.opts.apiKey)}`;
    const payload = {
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: behavior.generationConfig,
      tools: behavior.tools,
      systemInstruction: { parts: [{ text: behavior.systemInstruction }] },
    };

    this.logger.info({ model: this.opts.model, prompt: prompt.slice(0, 50) }, 'Gemini 요청 전송');
    this.logger.debug({ payload }, 'Gemini 페이로드');

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 60_000),
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error({ err: detail }, 'Gemini API 요청 실패');
      return { ok: false, kind: 'transport', detail };
    }

    if (res.status !== 200) {
      const excerpt = await res.text().then(
        (body) => body.slice(0, 500),
        () => '',
      );
      this.logger.error({ httpCode: res.status, response: excerpt }, 'Gemini API 요청 실패');
      return { ok: false, kind: 'transport', status: res.status, detail: `HTTP Code: ${res.status}` };
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Gemini 응답 JSON 파싱 실패');
      return { ok: false, kind: 'no-content', detail: 'undecodable response' };
    }

    // 200 응답 본문에 담긴 API 오류 (키 만료 등). 나머지 필드 형식과 무관하게 먼저 본다
    const envelope = errorEnvelopeSchema.safeParse(json);
    if (envelope.success && envelope.data.error !== undefined && envelope.data.error !== null) {
      const detail = remoteErrorMessage(envelope.data.error);
      this.logger.error({ detail }, 'Gemini API가 응답 본문에 오류를 반환했습니다');
      return { ok: false, kind: 'remote-error', detail };
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Gemini 응답 형식이 올바르지 않습니다');
      return { ok: false, kind: 'no-content', detail: 'malformed response' };
    }
    const body: GeminiResponse = parsed.data;

    const text = extractText(body);
    if (text) {
      this.logger.debug({ length: text.length }, 'Gemini 응답 수신');
      return { ok: true, text };
    }

    // 후보가 없거나 텍스트가 비어 있음 (안전 필터 차단 등)
    const detail = body.promptFeedback?.blockReason ?? body.candidates?.[0]?.finishReason;
    this.logger.warn({ detail }, 'Gemini 응답에 텍스트가 없습니다 (안전 필터 가능성)');
    return detail ? { ok: false, kind: 'no-content', detail } : { ok: false, kind: 'no-content' };
  }
}
