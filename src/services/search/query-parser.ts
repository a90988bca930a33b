import { InvalidQueryError } from '../../types/errors.js';

const WHITESPACE = /\s/;

/**
 * Splits a search query into keywords using shell quoting rules:
 * whitespace separates words, single quotes are literal, double quotes
 * allow backslash escapes of `"` and `\`, a bare backslash escapes the next
 * character. Adjacent quoted and unquoted parts join into one word.
 */
export function parseSearchQuery(query: string): string[] {
    const words: string[] = [];
    let current = '';
    let inWord = false;
    let pos = 0;

    while (pos < query.length) {
        const ch = query.charAt(pos);

        if (WHITESPACE.test(ch)) {
            if (inWord) {
                words.push(current);
                current = '';
                inWord = false;
            }
            pos++;
            continue;
        }

        inWord = true;

        if (ch === "'") {
            const close = query.indexOf("'", pos + 1);
            if (close === -1) {
                throw new InvalidQueryError(`Unterminated single quote at position ${pos}`, query);
            }
            current += query.slice(pos + 1, close);
            pos = close + 1;
            continue;
        }

        if (ch === '"') {
            const start = pos;
            pos++; // skip opening quote
            let closed = false;
            while (pos < query.length) {
                const inner = query.charAt(pos);
                if (inner === '\\' && pos + 1 < query.length) {
                    const next = query.charAt(pos + 1);
                    // inside double quotes only these escape
                    current += next === '"' || next === '\\' ? next : inner + next;
                    pos += 2;
                    continue;
                }
                if (inner === '"') {
                    closed = true;
                    pos++;
                    break;
                }
                current += inner;
                pos++;
            }
            if (!closed) {
                throw new InvalidQueryError(`Unterminated double quote at position ${start}`, query);
            }
            continue;
        }

        if (ch === '\\') {
            if (pos + 1 >= query.length) {
                throw new InvalidQueryError('Query ends with an escape character', query);
            }
            current += query.charAt(pos + 1);
            pos += 2;
            continue;
        }

        current += ch;
        pos++;
    }

    if (inWord) {
        words.push(current);
    }
    return words;
}
