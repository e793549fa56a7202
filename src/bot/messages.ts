// 사용자에게 보내는 고정 응답 문구

export function startMessage(botName: string, userId?: number): string {
  const idText = userId !== undefined ? `User ID: \`${userId}\`` : 'User ID: N/A';
  return [
    `*${botName}에 오신 것을 환영합니다!* 👋`,
    '무엇이든 질문을 보내주시면 Gemini가 답변해 드립니다.',
    '',
    '예시: _블랙홀은 어떻게 만들어지나요?_',
    '',
    idText,
  ].join('\n');
}

export const HELP_MESSAGE = [
  '*도움말* 💡',
  '질문을 그대로 보내주시면 됩니다.',
  '사용 가능한 명령어:',
  '• `/start` - 환영 메시지 표시',
  '• `/help` - 이 도움말 표시',
].join('\n');

export const ERROR_MESSAGE = [
  '🚨 *오류* 🚨',
  '요청을 처리하는 중 문제가 발생했습니다. 잠시 후 다시 시도해주세요. 관리자에게 알림이 전달되었습니다.',
].join('\n');

export const NOT_CONFIGURED_MESSAGE = '❌ AI 서비스가 아직 설정되지 않아 요청을 처리할 수 없습니다.';

export const NO_CONTENT_MESSAGE = '😔 이 질문에는 유효한 답변을 생성하지 못했습니다. 다른 표현으로 다시 질문해주세요.';
