import fs from 'fs/promises';
import type pino from 'pino';
import { z } from 'zod';

const toolSchema = z.record(z.unknown());

const geminiConfigSchema = z.object({
  systemInstruction: z
    .union([
      z.string(),
      z.object({ parts: z.array(z.object({ text: z.string() })).min(1) }),
    ])
    .optional(),
  tools: z.array(toolSchema).optional(),
  generationConfig: z.record(z.unknown()).optional(),
});

export type GeminiTool = z.infer<typeof toolSchema>;

/** gemini-config.json에서 읽은 모델 동작 설정 */
export interface GeminiBehavior {
  systemInstruction: string;
  tools: GeminiTool[];
  generationConfig: Record<string, unknown>;
}

/**
 * 파라미터 없이 켜기만 하는 도구 ("googleSearch": [] / true / null)를
 * API가 요구하는 빈 객체 {} 형태로 맞춘다.
 */
export function normalizeTools(tools: GeminiTool[]): GeminiTool[] {
  return tools.map((tool) =>
    Object.fromEntries(
      Object.entries(tool).map(([name, value]) => {
        const enabledWithoutParams =
          value === true ||
          value === null ||
          (Array.isArray(value) && value.length === 0) ||
          (typeof value === 'object' && value !== null && Object.keys(value).length === 0);
        return [name, enabledWithoutParams ? {} : value];
      }),
    ),
  );
}

export function parseGeminiBehavior(raw: string): GeminiBehavior {
  if (raw.trim() === '') throw new Error('Gemini 설정 파일이 비어 있습니다');

  const parsed = geminiConfigSchema.parse(JSON.parse(raw));
  if (Object.keys(parsed).length === 0) throw new Error('Gemini 설정에 유효한 항목이 없습니다');

  const instruction = parsed.systemInstruction;

  return {
    systemInstruction:
      typeof instruction === 'string' ? instruction : (instruction?.parts[0].text ?? ''),
    tools: normalizeTools(parsed.tools ?? []),
    generationConfig: parsed.generationConfig ?? {},
  };
}

/**
 * 동작 설정을 최초 요청 시 한 번만 읽는다 (동시 요청도 같은 Promise를 공유).
 * 파일이 없거나 읽을 수 없으면 null로 확정되어 클라이언트가 "미설정" 상태가 된다.
 */
export class GeminiConfigLoader {
  private loading: Promise<GeminiBehavior | null> | null = null;
  private path: string;
  private logger: pino.Logger;

  constructor(path: string, logger: pino.Logger) {
    this.path = path;
    this.logger = logger;
  }

  load(): Promise<GeminiBehavior | null> {
    if (!this.loading) {
      this.loading = this.read();
    }
    return this.loading;
  }

  private async read(): Promise<GeminiBehavior | null> {
    try {
      const raw = await fs.readFile(this.path, 'utf-8');
      const behavior = parseGeminiBehavior(raw);
      this.logger.debug({ path: this.path, tools: behavior.tools.length }, 'Gemini 설정 로드 완료');
      return behavior;
    } catch (err) {
      this.logger.fatal(
        { path: this.path, err: err instanceof Error ? err.message : String(err) },
        'Gemini 설정을 불러올 수 없습니다',
      );
      return null;
    }
  }
}
