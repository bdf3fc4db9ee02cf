/**
 * Static bot commands. None of them go through the reply resolver.
 */

export const START_TEXT =
  'Assalamu alaikum! 👋\n' +
  'Ni bot ne — zan iya tattaunawa da kai.\n\n' +
  'Commands:\n' +
  '/help - taimako\n' +
  '/echo <text> - maimaita sakonka\n\n' +
  "Just send me any message and I'll reply. (If a completion API key is configured the bot replies using an AI model.)";

export const HELP_TEXT =
  'Help:\n' +
  "• Send any text and I'll reply.\n" +
  '• I can speak Hausa and English.\n' +
  'Note: for smarter replies set the OPENAI_API_KEY environment variable.';

export const ECHO_USAGE = 'Usage: /echo your message';

/** `/echo` reply: the arguments joined by single spaces, or usage when there are none. */
export function echoText(args: string): string {
  const words = args.split(/\s+/).filter(Boolean);
  return words.length > 0 ? words.join(' ') : ECHO_USAGE;
}

export const COMMANDS = [
  { command: 'start', description: 'Fara / start' },
  { command: 'help', description: 'Taimako / help' },
  { command: 'echo', description: 'Repeat your message' },
] as const;
