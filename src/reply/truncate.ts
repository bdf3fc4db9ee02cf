import { TRUNCATION_HEADROOM } from '../config/schema.js';

/**
 * Cap a reply at maxLength characters. Longer text is cut to
 * maxLength - TRUNCATION_HEADROOM and the marker is appended.
 */
export function truncateReply(text: string, maxLength: number, marker: string): string {
  if (text.length <= maxLength) return text;
  let end = maxLength - TRUNCATION_HEADROOM;
  // Keep surrogate pairs whole
  if (isHighSurrogate(text.charCodeAt(end - 1))) end--;
  return text.slice(0, end) + marker;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
