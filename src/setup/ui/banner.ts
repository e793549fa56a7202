// ASCII 아트 배너
import * as p from '@clack/prompts';

const BANNER = `
   ____                _       _ ____      _
  / ___| ___ _ __ ___ (_)_ __ (_)  _ \\ ___| | __ _ _   _
 | |  _ / _ \\ '_ \` _ \\| | '_ \\| | |_) / _ \\ |/ _\` | | | |
 | |_| |  __/ | | | | | | | | | |  _ <  __/ | (_| | |_| |
  \\____|\\___|_| |_| |_|_|_| |_|_|_| \\_\\___|_|\\__,_|\\__, |
                                                   |___/
`;

export function showBanner(): void {
  console.log(BANNER);
  p.intro('GeminiRelay Setup');
}
