import type { InboundMessage } from './types.js';

/**
 * Plain substring test against the lower-cased text. Short keywords
 * ("me", "ina") match inside unrelated words too; that is accepted.
 */
export function matchesKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(k => lower.includes(k.toLowerCase()));
}

export function hausaReply(name: string, text: string): string {
  return `Na ji sakonka, ${name}. 🌸\nKa/ki rubuta: "${text}". Zan iya taimaka maka/ki — menene kake/kike so na yi?`;
}

export function englishReply(text: string): string {
  return `I heard you: "${text}".\nYou can ask me questions or say hi (e.g., 'Assalamu').`;
}

/** Local responder used without a completion key or after a failed call. */
export function fallbackReply(msg: InboundMessage, keywords: readonly string[]): string {
  return matchesKeyword(msg.text, keywords)
    ? hausaReply(msg.senderDisplayName, msg.text)
    : englishReply(msg.text);
}
