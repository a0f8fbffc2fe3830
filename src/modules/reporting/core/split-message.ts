/**
 * Split a long message into parts of at most `maxLength` characters,
 * breaking between lines. A single line longer than the limit is cut.
 */

import { TELEGRAM_MESSAGE_LIMIT } from './types.js';

export const splitMessage = (text: string, maxLength: number = TELEGRAM_MESSAGE_LIMIT): string[] => {
  if (text.length <= maxLength) return [text];

  const parts: string[] = [];
  let current = '';

  const pushLine = (line: string): void => {
    if (current === '') {
      current = line;
    } else if (current.length + 1 + line.length > maxLength) {
      parts.push(current);
      current = line;
    } else {
      current = `${current}\n${line}`;
    }
  };

  for (const line of text.split('\n')) {
    for (let start = 0; start === 0 || start < line.length; start += maxLength) {
      pushLine(line.slice(start, start + maxLength));
    }
  }
  if (current !== '') parts.push(current);

  return parts;
};
