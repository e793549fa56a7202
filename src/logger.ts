import pino from 'pino';

import type { OperatorAlertStream } from './alert/operator-alert.js';

const LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function toLevel(value: string, fallback: pino.Level): pino.Level {
  return LEVELS.find((level) => level === value) ?? fallback;
}

export interface LoggerOptions {
  level: string;
  /** 모든 레코드를 남기는 로그 파일 경로 */
  filePath?: string;
  /** 콘솔 출력 (pino-pretty). 기본 true */
  pretty?: boolean;
  /** 운영자 채팅 전달 싱크와 그 최소 레벨 */
  alert?: { level: string; stream: OperatorAlertStream };
  /** 지정 시 콘솔/파일 트랜스포트 대신 사용 (테스트용) */
  destination?: pino.DestinationStream;
}

function createBaseDestination(level: pino.Level, opts: LoggerOptions): pino.DestinationStream {
  if (opts.destination) return opts.destination;

  const targets: pino.TransportTargetOptions[] = [];
  if (opts.pretty !== false) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname,skipAlert',
      },
    });
  }
  if (opts.filePath) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: opts.filePath, mkdir: true },
    });
  }
  if (targets.length === 0) {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  }
  return pino.transport({ targets });
}

/**
 * 프로세스당 한 번 생성해 각 컴포넌트에 주입하는 로거.
 * 콘솔/파일 싱크에 더해, alert가 주어지면 해당 레벨 이상의 레코드를 운영자 채팅으로 전달한다.
 */
export function createLogger(opts: LoggerOptions): pino.Logger {
  const level = toLevel(opts.level, 'info');
  const streams: pino.StreamEntry[] = [
    { level, stream: createBaseDestination(level, opts) },
  ];

  if (opts.alert) {
    streams.push({ level: toLevel(opts.alert.level, 'error'), stream: opts.alert.stream });
  }

  return pino({ level }, pino.multistream(streams));
}
