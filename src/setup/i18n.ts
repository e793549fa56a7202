// 한국어/영어 메시지 카탈로그
import type { Language } from './types.js';

const messages = {
  ko: {
    // 공통
    welcome: 'GeminiRelay 설정 마법사에 오신 것을 환영합니다!',
    cancelled: '설정이 취소되었습니다.',
    done: '설정이 완료되었습니다!',

    // Step 2: 인증
    credentialsTitle: '인증 설정',
    enterTelegramToken: 'Telegram Bot Token을 입력하세요 (@BotFather에서 발급)',
    enterGeminiKey: 'Gemini API Key를 입력하세요 (Google AI Studio에서 발급)',
    enterErrorChatId: '오류 알림을 받을 Telegram 채팅 ID',
    telegramTokenRequired: 'Telegram Bot Token은 필수입니다',
    geminiKeyRequired: 'Gemini API Key는 필수입니다',
    errorChatIdRequired: '오류 알림 채팅 ID는 필수입니다',
    telegramTokenInvalid: 'Telegram Bot Token 형식이 올바르지 않습니다 (숫자:문자열)',
    errorChatIdInvalid: '채팅 ID는 정수여야 합니다 (그룹은 -100으로 시작)',

    // Step 3: 설정
    settingsTitle: '선택 설정',
    enterBotName: '봇 표시 이름 (환영 메시지와 오류 알림에 사용)',
    selectModel: 'Gemini 모델을 선택하세요',
    selectLogLevel: '로그 레벨을 선택하세요',
    enterPort: '웹훅 서버 포트',
    portInvalid: '1~65535 사이의 숫자를 입력하세요',

    // Step 4: .env 생성
    envTitle: '.env 파일 생성',
    envExists: '.env 파일이 이미 존재합니다. 덮어쓰시겠습니까?',
    envCreated: '.env 파일이 생성되었습니다',
    envSettingSummary: '설정 요약',

    // Step 5: Gemini 동작 설정
    geminiConfigTitle: 'Gemini 동작 설정',
    geminiConfigExists: (file: string) => `${file} 파일이 이미 있어 그대로 사용합니다`,
    enterSystemInstruction: '시스템 지시문 (봇의 역할과 말투)',
    enableSearch: 'Google 검색 그라운딩을 사용하시겠습니까?',
    geminiConfigCreated: (file: string) => `${file} 파일이 생성되었습니다`,

    // Step 6: 웹훅 등록
    webhookTitle: '웹훅 등록',
    enterWebhookUrl: '공개 웹훅 URL (비워두면 건너뜀)',
    webhookUrlInvalid: 'https:// 로 시작하는 URL이어야 합니다',
    webhookSkipped: '웹훅 등록을 건너뛰었습니다',
    webhookOk: (url: string) => `웹훅 등록 완료: ${url}`,
    webhookFail: (error: string) => `웹훅 등록 실패: ${error}`,

    // 건강 체크
    healthCheckTitle: '인증 정보 검증',
    healthCheckRunning: 'API 연결 테스트 중...',
    healthCheckDone: '검증 완료',
    healthCheckTelegramOk: (botName: string) => `Telegram Bot 연결 성공: ${botName}`,
    healthCheckTelegramFail: (error: string) => `Telegram Bot 연결 실패: ${error}`,
    healthCheckGeminiOk: (model: string) => `Gemini API 연결 성공: ${model}`,
    healthCheckGeminiFail: (error: string) => `Gemini API 연결 실패: ${error}`,
    healthCheckContinue: '검증에 실패한 항목이 있습니다. 계속 진행하시겠습니까?',

    // 완료
    setupNext: '봇을 실행하려면: npm run dev (개발) / npm run build && npm start (프로덕션)',
  },
  en: {
    welcome: 'Welcome to GeminiRelay Setup Wizard!',
    cancelled: 'Setup cancelled.',
    done: 'Setup complete!',

    credentialsTitle: 'Authentication',
    enterTelegramToken: 'Enter Telegram Bot Token (from @BotFather)',
    enterGeminiKey: 'Enter Gemini API Key (from Google AI Studio)',
    enterErrorChatId: 'Telegram chat ID for error alerts',
    telegramTokenRequired: 'Telegram Bot Token is required',
    geminiKeyRequired: 'Gemini API Key is required',
    errorChatIdRequired: 'Error alert chat ID is required',
    telegramTokenInvalid: 'Invalid Telegram Bot Token format (number:string)',
    errorChatIdInvalid: 'Chat ID must be an integer (groups start with -100)',

    settingsTitle: 'Optional Settings',
    enterBotName: 'Bot display name (used in welcome text and alerts)',
    selectModel: 'Select Gemini model',
    selectLogLevel: 'Select log level',
    enterPort: 'Webhook server port',
    portInvalid: 'Enter a number between 1 and 65535',

    envTitle: '.env File Generation',
    envExists: '.env file already exists. Overwrite?',
    envCreated: '.env file created',
    envSettingSummary: 'Settings Summary',

    geminiConfigTitle: 'Gemini Behaviour',
    geminiConfigExists: (file: string) => `${file} already exists, keeping it`,
    enterSystemInstruction: 'System instruction (role and tone of the bot)',
    enableSearch: 'Enable Google Search grounding?',
    geminiConfigCreated: (file: string) => `${file} created`,

    webhookTitle: 'Webhook Registration',
    enterWebhookUrl: 'Public webhook URL (leave empty to skip)',
    webhookUrlInvalid: 'URL must start with https://',
    webhookSkipped: 'Webhook registration skipped',
    webhookOk: (url: string) => `Webhook registered: ${url}`,
    webhookFail: (error: string) => `Webhook registration failed: ${error}`,

    healthCheckTitle: 'Credential Verification',
    healthCheckRunning: 'Testing API connections...',
    healthCheckDone: 'Verification complete',
    healthCheckTelegramOk: (botName: string) => `Telegram Bot connected: ${botName}`,
    healthCheckTelegramFail: (error: string) => `Telegram Bot connection failed: ${error}`,
    healthCheckGeminiOk: (model: string) => `Gemini API connected: ${model}`,
    healthCheckGeminiFail: (error: string) => `Gemini API connection failed: ${error}`,
    healthCheckContinue: 'Some verifications failed. Continue anyway?',

    setupNext: 'To start the bot: npm run dev (development) / npm run build && npm start (production)',
  },
} as const;

type MessageKey = keyof typeof messages.ko;

export function t<K extends MessageKey>(
  lang: Language,
  key: K,
): (typeof messages.ko)[K] {
  return messages[lang][key] as (typeof messages.ko)[K];
}
