export interface WebhookServerOpts {
  /** 포트 번호 (0이면 임의 포트) */
  port: number;
  /** 설정 시 X-Telegram-Bot-Api-Secret-Token 헤더와 일치해야 한다 */
  secretToken?: string;
  /** 디코딩된 업데이트 페이로드 처리 콜백 */
  onUpdate: (payload: unknown) => Promise<void>;
}

/** 처리 결과와 무관하게 200으로 응답할 때의 본문 */
export const OK_BODY = 'OK';
export const ERROR_BODY = 'An error occurred, log reported.';
