// TUI 설정 마법사 타입 정의

export type Language = 'ko' | 'en';

export interface WizardState {
  language: Language;
  credentials: {
    telegramBotToken: string;
    geminiApiKey: string;
    errorChatId: string;
  };
  settings: {
    botName: string;
    geminiModel: string;
    logLevel: string;
    webhookPort: string;
    webhookSecret: string;
  };
}
