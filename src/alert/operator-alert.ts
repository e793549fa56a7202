import pino from 'pino';
import { z } from 'zod';

/** 운영자 채팅으로 텍스트 한 건을 보내는 함수 (TelegramClient.send 바인딩) */
export type AlertSender = (text: string) => Promise<unknown>;

// 이 바인딩이 붙은 레코드는 전달하지 않는다 (알림 전송 실패가 다시 알림을 만들지 않도록)
export const SKIP_ALERT = { skipAlert: true } as const;

const TELEGRAM_MAX_LENGTH = 4096;
const MAX_CONTEXT_LENGTH = 3000;
const OMITTED_FIELDS = new Set(['level', 'time', 'msg', 'pid', 'hostname', 'skipAlert']);

const recordSchema = z
  .object({
    level: z.number(),
    time: z.number().optional(),
    msg: z.string().optional(),
    skipAlert: z.boolean().optional(),
  })
  .passthrough();

type AlertRecord = z.infer<typeof recordSchema>;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** 이스케이프된 HTML을 max 이하로 자른다. 엔티티와 서로게이트 쌍 중간에서는 자르지 않는다 */
export function truncateEscaped(escaped: string, max: number): string {
  if (escaped.length <= max) return escaped;
  let cut = escaped.slice(0, Math.max(0, max - 1));
  const amp = cut.lastIndexOf('&');
  if (amp !== -1 && cut.indexOf(';', amp) === -1) cut = cut.slice(0, amp);
  if (/[\uD800-\uDBFF]$/.test(cut)) cut = cut.slice(0, -1);
  return cut + '…';
}

function parseRecord(line: string): AlertRecord | null {
  try {
    const parsed = recordSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function formatAlert(botName: string, record: AlertRecord): string {
  const label = (pino.levels.labels[record.level] ?? String(record.level)).toUpperCase();
  const time = new Date(record.time ?? Date.now()).toISOString();

  const context = Object.fromEntries(
    Object.entries(record).filter(([key]) => !OMITTED_FIELDS.has(key)),
  );
  let contextJson = JSON.stringify(context, null, 2);
  if (contextJson.length > MAX_CONTEXT_LENGTH) {
    contextJson = contextJson.slice(0, MAX_CONTEXT_LENGTH) + '\n...';
  }

  const text = [
    `🚨 <b>${escapeHtml(botName)} 오류 알림</b> 🚨`,
    `<b>Level:</b> ${label}`,
    `<b>Time:</b> ${time}`,
    `<b>Message:</b> ${escapeHtml(record.msg ?? '')}`,
    `<b>Context:</b>`,
    `<pre>${escapeHtml(contextJson)}</pre>`,
  ].join('\n');

  if (text.length <= TELEGRAM_MAX_LENGTH) return text;

  // 메시지 본문이 비정상적으로 긴 경우 컨텍스트를 버리고 이스케이프된 메시지를 남은 길이에 맞춘다
  const head = [
    `🚨 <b>${escapeHtml(botName)} 오류 알림</b> 🚨`,
    `<b>Level:</b> ${label}`,
    `<b>Time:</b> ${time}`,
    `<b>Message:</b> `,
  ].join('\n');
  return head + truncateEscaped(escapeHtml(record.msg ?? ''), TELEGRAM_MAX_LENGTH - head.length);
}

/**
 * pino multistream 싱크. 직렬화된 레코드를 받아 운영자 채팅으로 전달한다.
 * 전달은 비동기로 진행되며 실패해도 다른 싱크로의 기록을 막지 않는다.
 */
export class OperatorAlertStream implements pino.DestinationStream {
  private sender: AlertSender | null = null;
  private pending = new Set<Promise<void>>();
  private botName: string;

  constructor(botName: string) {
    this.botName = botName;
  }

  /** 연결 전에 들어온 레코드는 버려진다 */
  connect(sender: AlertSender): void {
    this.sender = sender;
  }

  write(line: string): void {
    const sender = this.sender;
    if (!sender) return;

    const record = parseRecord(line);
    if (!record || record.skipAlert) return;

    const text = formatAlert(this.botName, record);
    const task: Promise<void> = Promise.resolve()
      .then(() => sender(text))
      .then(
        () => undefined,
        () => {
          // 알림 전송 실패는 무시 (로깅하면 다시 알림 대상이 된다)
        },
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** 진행 중인 전달이 모두 끝날 때까지 대기 */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
