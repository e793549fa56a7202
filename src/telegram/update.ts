import { z } from 'zod';

/** 인바운드 Telegram 업데이트 한 건의 정규화된 표현 */
export interface Update {
  /** 응답을 보낼 채팅 ID (없으면 빈 문자열) */
  readonly chatId: string;
  /** 앞뒤 공백이 제거된 메시지 텍스트 */
  readonly text: string;
  readonly userId?: number;
}

// 필드 단위로 .catch()를 걸어 잘못된 값은 예외 없이 기본값으로 떨어진다
const messageSchema = z.object({
  chat: z
    .object({ id: z.union([z.number(), z.string()]) })
    .optional()
    .catch(undefined),
  text: z.string().optional().catch(undefined),
  from: z
    .object({ id: z.number().int() })
    .optional()
    .catch(undefined),
});

const rawUpdateSchema = z.object({
  message: messageSchema.nullish().catch(undefined),
  edited_message: messageSchema.nullish().catch(undefined),
});

const EMPTY_UPDATE: Update = Object.freeze({ chatId: '', text: '' });

/**
 * 원시 웹훅 페이로드를 Update로 변환한다. 새 메시지를 수정된 메시지보다 우선한다.
 * 어떤 입력에도 예외를 던지지 않으며, 유효성은 isValidUpdate()로만 판단한다.
 */
export function normalizeUpdate(raw: unknown): Update {
  const parsed = rawUpdateSchema.safeParse(raw);
  if (!parsed.success) return EMPTY_UPDATE;

  const message = parsed.data.message ?? parsed.data.edited_message;
  if (!message) return EMPTY_UPDATE;

  const update: Update = {
    chatId: message.chat ? String(message.chat.id) : '',
    text: (message.text ?? '').trim(),
    ...(message.from ? { userId: message.from.id } : {}),
  };
  return Object.freeze(update);
}

export function isValidUpdate(update: Update): boolean {
  return update.chatId !== '' && update.text !== '';
}
