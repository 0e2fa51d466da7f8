/**
 * Reply Parsers
 *
 * Turn free-text model replies into typed labels. None of these throw:
 * anything uninterpretable becomes the label's fallback value.
 */

import { Category, Sentiment } from '../types/index.js';

const FENCE = /^```[\w-]*\s*\n?([\s\S]*?)\n?\s*```$/;

/**
 * Strip surrounding whitespace and one Markdown code fence, if present
 */
export function unwrapReply(reply: string): string {
  const trimmed = reply.trim();
  const fenced = trimmed.match(FENCE);
  return fenced ? fenced[1].trim() : trimmed;
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Parse a list literal of quoted strings, e.g. `['a', "b"]`.
 * Returns null when the text is anything else.
 */
export function parseStringListLiteral(text: string): string[] | null {
  let pos = 0;

  const skipSpace = () => {
    while (pos < text.length && /\s/.test(text[pos])) pos++;
  };

  const readString = (): string | null => {
    const quote = text[pos];
    if (quote !== "'" && quote !== '"') return null;
    pos++;

    let value = '';
    while (pos < text.length) {
      const ch = text[pos];
      if (ch === quote) {
        pos++;
        return value;
      }
      if (ch === '\n') return null;
      if (ch === '\\') {
        const next = text[pos + 1];
        if (next === undefined) return null;
        if (next === 'u') {
          const hex = text.slice(pos + 2, pos + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) return null;
          value += String.fromCharCode(parseInt(hex, 16));
          pos += 6;
          continue;
        }
        value += ESCAPES[next] ?? `\\${next}`;
        pos += 2;
        continue;
      }
      value += ch;
      pos++;
    }
    return null;
  };

  skipSpace();
  if (text[pos] !== '[') return null;
  pos++;

  const items: string[] = [];
  for (;;) {
    skipSpace();
    if (text[pos] === ']') {
      pos++;
      break;
    }

    const item = readString();
    if (item === null) return null;
    items.push(item);

    skipSpace();
    if (text[pos] === ',') {
      pos++;
      continue;
    }
    if (text[pos] === ']') {
      pos++;
      break;
    }
    return null;
  }

  skipSpace();
  return pos === text.length ? items : null;
}

export function parseTags(reply: string): string[] {
  return parseStringListLiteral(unwrapReply(reply)) ?? [];
}

function matchMember<T extends string>(members: Record<string, T>, reply: string): T | null {
  const key = reply.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(members, key) ? members[key] : null;
}

export function parseCategory(reply: string): Category {
  return matchMember<Category>(Category, reply) ?? Category.NONE;
}

export function parseSentiment(reply: string): Sentiment {
  return matchMember<Sentiment>(Sentiment, reply) ?? Sentiment.NONE;
}

/**
 * Only the literal `true` (any case) counts; everything else is false
 */
export function parseFlag(reply: string): boolean {
  return reply.trim().toLowerCase() === 'true';
}
