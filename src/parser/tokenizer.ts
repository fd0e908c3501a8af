import type { Token, TokenType } from '../types/parser.js';
import { createSyntaxError } from '../types/errors.js';

type SyntaxErrorCode = 'RULE_SYNTAX_ERROR' | 'QUERY_SYNTAX_ERROR';

const NAME_START = /[A-Za-z0-9_:]/;
const NAME_PART = /[A-Za-z0-9_\-:./#~%+]/;
const VARIABLE_PART = /[A-Za-z0-9_]/;
const NUMBER = /^\d+(\.\d+)?$/;

const ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    '"': '"',
    "'": "'",
    '\\': '\\',
};

/**
 * Tokenizer for rule lines and query text
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];
    private code: SyntaxErrorCode;

    constructor(input: string, code: SyntaxErrorCode = 'QUERY_SYNTAX_ERROR') {
        this.input = input;
        this.code = code;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespaceAndComments();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            if (this.input.startsWith('=>', this.pos)) {
                this.addToken('ARROW', '=>');
                this.pos += 2;
                continue;
            }

            switch (char) {
                case '{': this.addToken('LBRACE', '{'); this.pos++; continue;
                case '}': this.addToken('RBRACE', '}'); this.pos++; continue;
                case '.': this.addToken('DOT', '.'); this.pos++; continue;
                case ';': this.addToken('SEMICOLON', ';'); this.pos++; continue;
                case ',': this.addToken('COMMA', ','); this.pos++; continue;
                case '*': this.addToken('STAR', '*'); this.pos++; continue;
                case '<': this.readIri(); continue;
                case '?':
                case '$': this.readVariable(); continue;
                case '"':
                case "'": this.readLiteral(char); continue;
            }

            if (NAME_START.test(char)) {
                this.readName();
                continue;
            }

            throw this.error(`Unexpected character '${char}'`, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespaceAndComments(): void {
        while (this.pos < this.input.length) {
            const char = this.input[this.pos];
            if (/\s/.test(char)) {
                this.pos++;
            } else if (char === '#') {
                while (this.pos < this.input.length && this.input[this.pos] !== '\n') {
                    this.pos++;
                }
            } else {
                break;
            }
        }
    }

    private readIri(): void {
        const start = this.pos;
        const end = this.input.indexOf('>', start);
        const body = end === -1 ? '' : this.input.slice(start + 1, end);
        if (end === -1 || /\s/.test(body)) {
            throw this.error('Unterminated IRI - missing closing \'>\'', start);
        }
        this.tokens.push({ type: 'IRI', value: `<${body}>`, position: start });
        this.pos = end + 1;
    }

    private readVariable(): void {
        const start = this.pos;
        this.pos++;
        while (this.pos < this.input.length && VARIABLE_PART.test(this.input[this.pos])) {
            this.pos++;
        }
        const name = this.input.slice(start + 1, this.pos);
        if (!name) {
            throw this.error('Expected a variable name', start);
        }
        this.tokens.push({ type: 'VARIABLE', value: name, position: start });
    }

    private readName(): void {
        const start = this.pos;
        while (this.pos < this.input.length && NAME_PART.test(this.input[this.pos])) {
            this.pos++;
        }
        // A trailing '.' ends the statement, it is not part of the name
        while (this.pos > start + 1 && this.input[this.pos - 1] === '.') {
            this.pos--;
        }
        const value = this.input.slice(start, this.pos);
        this.tokens.push({ type: NUMBER.test(value) ? 'NUMBER' : 'NAME', value, position: start });
    }

    private readLiteral(quote: string): void {
        const start = this.pos;
        this.pos++;
        let value = '';
        let closed = false;

        while (this.pos < this.input.length) {
            const char = this.input[this.pos];
            if (char === '\\') {
                const next = this.input[this.pos + 1];
                const escaped = next !== undefined ? ESCAPES[next] : undefined;
                if (escaped === undefined) {
                    throw this.error(`Invalid escape sequence '\\${next ?? ''}'`, this.pos);
                }
                value += escaped;
                this.pos += 2;
                continue;
            }
            if (char === quote) {
                closed = true;
                this.pos++;
                break;
            }
            if (char === '\n') break;
            value += char;
            this.pos++;
        }

        if (!closed) {
            throw this.error('Unterminated string literal', start);
        }

        const token: Token = { type: 'LITERAL', value, position: start };

        if (this.input[this.pos] === '@') {
            const langStart = ++this.pos;
            while (this.pos < this.input.length && /[A-Za-z0-9-]/.test(this.input[this.pos])) {
                this.pos++;
            }
            if (this.pos === langStart) {
                throw this.error('Expected a language tag after \'@\'', langStart);
            }
            token.language = this.input.slice(langStart, this.pos);
        } else if (this.input.startsWith('^^', this.pos)) {
            this.pos += 2;
            const dtStart = this.pos;
            if (this.input[this.pos] === '<') {
                const end = this.input.indexOf('>', this.pos);
                if (end === -1) {
                    throw this.error('Unterminated datatype IRI', dtStart);
                }
                this.pos = end + 1;
            } else {
                while (this.pos < this.input.length && NAME_PART.test(this.input[this.pos])) {
                    this.pos++;
                }
                while (this.pos > dtStart && this.input[this.pos - 1] === '.') {
                    this.pos--;
                }
            }
            if (this.pos === dtStart) {
                throw this.error('Expected a datatype after \'^^\'', dtStart);
            }
            token.datatype = this.input.slice(dtStart, this.pos);
        }

        this.tokens.push(token);
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
    }

    private error(message: string, position: number) {
        return createSyntaxError(this.code, message, this.input, position);
    }
}

/**
 * Tokenize text, reporting errors under the given code
 */
export function tokenize(input: string, code: SyntaxErrorCode = 'QUERY_SYNTAX_ERROR'): Token[] {
    return new Tokenizer(input, code).tokenize();
}
