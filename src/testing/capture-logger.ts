import pino from 'pino';

export interface CapturedRecord {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

/** 기록된 레코드를 메모리에 모으는 테스트용 pino 로거 */
export function captureLogger(level: pino.Level = 'debug'): {
  logger: pino.Logger;
  records: CapturedRecord[];
  destination: pino.DestinationStream;
} {
  const records: CapturedRecord[] = [];
  const destination: pino.DestinationStream = {
    write(line: string) {
      records.push(JSON.parse(line));
    },
  };
  return { logger: pino({ level }, destination), records, destination };
}

export function levelOf(label: pino.Level): number {
  return pino.levels.values[label];
}
