/**
 * Line tokenizer for the histogram grammar.
 *
 * Tokens are separated by whitespace. A double-quoted span keeps its
 * whitespace and `=` characters; inside quotes `\"` and `\\` are escapes.
 * Quotes are stripped from the token text.
 */
import { MalformedLineError } from './errors.js';

export interface Token {
    /** Unquoted, unescaped text. */
    text: string;
    /** Offset of the token's first character in the line. */
    start: number;
    /** Index in `text` of the first `=` outside quotes, or -1. */
    eqIndex: number;
    /** True when any part of the token was quoted. */
    quoted: boolean;
}

function isWhitespace(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function tokenize(line: string): Token[] {
    const tokens: Token[] = [];
    let pos = 0;

    while (pos < line.length) {
        if (isWhitespace(line[pos])) {
            pos++;
            continue;
        }

        const start = pos;
        let text = '';
        let eqIndex = -1;
        let quoted = false;

        while (pos < line.length && !isWhitespace(line[pos])) {
            const ch = line[pos];
            if (ch === '"') {
                quoted = true;
                pos = readQuoted(line, pos, (s) => { text += s; });
                continue;
            }
            if (ch === '=' && eqIndex < 0) eqIndex = text.length;
            text += ch;
            pos++;
        }

        tokens.push({ text, start, eqIndex, quoted });
    }

    return tokens;
}

/** Reads a quoted span starting at the opening quote; returns the position after the closing quote. */
function readQuoted(line: string, open: number, emit: (s: string) => void): number {
    let pos = open + 1;
    while (pos < line.length) {
        const ch = line[pos];
        if (ch === '\\' && pos + 1 < line.length) {
            const next = line[pos + 1];
            if (next === '"' || next === '\\') {
                emit(next);
                pos += 2;
                continue;
            }
        }
        if (ch === '"') return pos + 1;
        emit(ch);
        pos++;
    }
    throw new MalformedLineError('Unterminated quote', line, open);
}
