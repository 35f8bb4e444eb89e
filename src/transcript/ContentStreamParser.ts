/**
 * Content Stream Parser
 *
 * Tokenizes decoded PDF content streams and groups operands with the
 * operator that follows them. Used for page content and for embedded
 * ToUnicode CMap streams, which share the same syntax.
 */

import type { PDFArray, PDFDict, PDFOperator, PDFValue } from './types';

// Token types for lexer
type TokenType =
  | 'number'
  | 'string'
  | 'hexstring'
  | 'name'
  | 'keyword'
  | 'arrayStart'
  | 'arrayEnd'
  | 'dictStart'
  | 'dictEnd';

type Token =
  | { type: 'number'; value: number }
  | { type: 'string' | 'hexstring'; bytes: Uint8Array }
  | { type: 'name' | 'keyword'; value: string }
  | { type: Exclude<TokenType, 'number' | 'string' | 'hexstring' | 'name' | 'keyword'> };

/**
 * Lexer for PDF content streams
 */
export class ContentStreamLexer {
  private data: Uint8Array;
  private pos: number = 0;
  private length: number;

  constructor(data: Uint8Array) {
    this.data = data;
    this.length = data.length;
  }

  /**
   * Get all tokens from the stream
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token: Token | null;

    while ((token = this.nextToken()) !== null) {
      tokens.push(token);
    }

    return tokens;
  }

  /**
   * Get next token from stream
   */
  nextToken(): Token | null {
    while (true) {
      this.skipWhitespaceAndComments();

      if (this.pos >= this.length) {
        return null;
      }

      const ch = this.data[this.pos];

      // String literal (...)
      if (ch === 0x28) { // '('
        return this.readStringLiteral();
      }

      if (ch === 0x3C) { // '<'
        if (this.peek(1) === 0x3C) {
          this.pos += 2;
          return { type: 'dictStart' };
        }
        return this.readHexString();
      }

      if (ch === 0x3E && this.peek(1) === 0x3E) { // '>>'
        this.pos += 2;
        return { type: 'dictEnd' };
      }

      if (ch === 0x5B) { // '['
        this.pos++;
        return { type: 'arrayStart' };
      }

      if (ch === 0x5D) { // ']'
        this.pos++;
        return { type: 'arrayEnd' };
      }

      if (ch === 0x2F) { // '/'
        return this.readName();
      }

      // Number (including negative and decimal)
      if (this.isDigit(ch) || ch === 0x2D || ch === 0x2B || ch === 0x2E) {
        return this.readNumber();
      }

      if (this.isRegularChar(ch)) {
        return this.readKeyword();
      }

      // Stray delimiter such as '{', '}' or a lone '>'
      this.pos++;
    }
  }

  private peek(offset: number): number | undefined {
    const index = this.pos + offset;
    return index < this.length ? this.data[index] : undefined;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.length) {
      const ch = this.data[this.pos];

      if (this.isWhitespace(ch)) {
        this.pos++;
        continue;
      }

      // Comment: %...
      if (ch === 0x25) {
        while (this.pos < this.length && this.data[this.pos] !== 0x0A && this.data[this.pos] !== 0x0D) {
          this.pos++;
        }
        continue;
      }

      break;
    }
  }

  private readStringLiteral(): Token {
    this.pos++; // Skip opening '('
    let depth = 1;
    const bytes: number[] = [];

    while (this.pos < this.length && depth > 0) {
      const ch = this.data[this.pos];

      if (ch === 0x5C) { // '\' escape
        this.pos++;
        if (this.pos >= this.length) break;
        const escaped = this.data[this.pos];
        switch (escaped) {
          case 0x6E: bytes.push(0x0A); break; // \n
          case 0x72: bytes.push(0x0D); break; // \r
          case 0x74: bytes.push(0x09); break; // \t
          case 0x62: bytes.push(0x08); break; // \b
          case 0x66: bytes.push(0x0C); break; // \f
          case 0x0A: break; // Line continuation
          case 0x0D:
            if (this.peek(1) === 0x0A) {
              this.pos++;
            }
            break;
          default:
            if (this.isOctalDigit(escaped)) {
              let code = escaped - 0x30;
              for (let i = 0; i < 2; i++) {
                const next = this.peek(1);
                if (next === undefined || !this.isOctalDigit(next)) break;
                this.pos++;
                code = code * 8 + (next - 0x30);
              }
              bytes.push(code & 0xFF);
            } else {
              // \( \) \\ and unknown escapes keep the character itself
              bytes.push(escaped);
            }
        }
        this.pos++;
        continue;
      }

      if (ch === 0x28) {
        depth++;
      } else if (ch === 0x29) {
        depth--;
        if (depth === 0) {
          this.pos++;
          break;
        }
      }
      bytes.push(ch);
      this.pos++;
    }

    return { type: 'string', bytes: new Uint8Array(bytes) };
  }

  private readHexString(): Token {
    this.pos++; // Skip opening '<'
    const digits: number[] = [];

    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      this.pos++;
      if (ch === 0x3E) break;
      if (this.isHexDigit(ch)) {
        digits.push(this.hexValue(ch));
      }
    }

    // Odd digit count: the final digit is followed by an implicit 0
    if (digits.length % 2 !== 0) {
      digits.push(0);
    }

    const bytes = new Uint8Array(digits.length / 2);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = (digits[i * 2] << 4) | digits[i * 2 + 1];
    }

    return { type: 'hexstring', bytes };
  }

  private readName(): Token {
    this.pos++; // Skip '/'
    let name = '';

    while (this.pos < this.length) {
      const ch = this.data[this.pos];

      if (this.isWhitespace(ch) || this.isDelimiter(ch)) {
        break;
      }

      // #XX hex escape
      const h1 = this.peek(1);
      const h2 = this.peek(2);
      if (ch === 0x23 && h1 !== undefined && h2 !== undefined && this.isHexDigit(h1) && this.isHexDigit(h2)) {
        name += String.fromCharCode((this.hexValue(h1) << 4) | this.hexValue(h2));
        this.pos += 3;
        continue;
      }

      name += String.fromCharCode(ch);
      this.pos++;
    }

    return { type: 'name', value: name };
  }

  private readNumber(): Token {
    let numStr = '';
    let hasDecimal = false;

    if (this.data[this.pos] === 0x2D || this.data[this.pos] === 0x2B) {
      numStr += String.fromCharCode(this.data[this.pos]);
      this.pos++;
    }

    while (this.pos < this.length) {
      const ch = this.data[this.pos];

      if (this.isDigit(ch)) {
        numStr += String.fromCharCode(ch);
        this.pos++;
      } else if (ch === 0x2E && !hasDecimal) {
        numStr += '.';
        hasDecimal = true;
        this.pos++;
      } else {
        break;
      }
    }

    // A bare sign or dot reads as zero
    const value = parseFloat(numStr);
    return { type: 'number', value: Number.isNaN(value) ? 0 : value };
  }

  private readKeyword(): Token {
    let keyword = '';

    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      if (this.isWhitespace(ch) || this.isDelimiter(ch)) {
        break;
      }
      keyword += String.fromCharCode(ch);
      this.pos++;
    }

    return { type: 'keyword', value: keyword };
  }

  private isDigit(ch: number): boolean {
    return ch >= 0x30 && ch <= 0x39;
  }

  private isOctalDigit(ch: number): boolean {
    return ch >= 0x30 && ch <= 0x37;
  }

  private isHexDigit(ch: number): boolean {
    return (ch >= 0x30 && ch <= 0x39) ||
           (ch >= 0x41 && ch <= 0x46) ||
           (ch >= 0x61 && ch <= 0x66);
  }

  private hexValue(ch: number): number {
    if (ch <= 0x39) return ch - 0x30;
    if (ch <= 0x46) return ch - 0x41 + 10;
    return ch - 0x61 + 10;
  }

  private isWhitespace(ch: number): boolean {
    return ch === 0x00 || ch === 0x09 || ch === 0x0A || ch === 0x0C || ch === 0x0D || ch === 0x20;
  }

  private isDelimiter(ch: number): boolean {
    return ch === 0x28 || ch === 0x29 || // '(' ')'
           ch === 0x3C || ch === 0x3E || // '<' '>'
           ch === 0x5B || ch === 0x5D || // '[' ']'
           ch === 0x7B || ch === 0x7D || // '{' '}'
           ch === 0x2F ||                // '/'
           ch === 0x25;                  // '%'
  }

  private isRegularChar(ch: number): boolean {
    return !this.isWhitespace(ch) && !this.isDelimiter(ch);
  }
}

/**
 * Parser for PDF content streams
 */
export class ContentStreamParser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(data: Uint8Array) {
    this.tokens = new ContentStreamLexer(data).tokenize();
  }

  /**
   * Parse the content stream into operators. Operands left over at the end
   * of the stream belong to no operator and are dropped.
   */
  parse(): PDFOperator[] {
    const operators: PDFOperator[] = [];
    let operandStack: PDFValue[] = [];
    this.pos = 0;

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos];

      if (token.type === 'keyword' && !this.isLiteralKeyword(token.value)) {
        operators.push({ operator: token.value, operands: operandStack });
        operandStack = [];
        this.pos++;
        continue;
      }

      const value = this.parseValue();
      if (value !== null) {
        operandStack.push(value);
      }
    }

    return operators;
  }

  /**
   * Read one value starting at the current token. Returns null for tokens
   * that carry no value (a stray ']' or '>>').
   */
  private parseValue(): PDFValue | null {
    const token = this.tokens[this.pos];

    switch (token.type) {
      case 'number':
        this.pos++;
        return { type: 'number', value: token.value };
      case 'string':
      case 'hexstring':
        this.pos++;
        return {
          type: 'string',
          bytes: token.bytes,
          encoding: token.type === 'hexstring' ? 'hex' : 'literal'
        };
      case 'name':
        this.pos++;
        return { type: 'name', value: token.value };
      case 'arrayStart':
        return this.parseArray();
      case 'dictStart':
        return this.parseDict();
      case 'keyword':
        this.pos++;
        if (token.value === 'true') return { type: 'boolean', value: true };
        if (token.value === 'false') return { type: 'boolean', value: false };
        if (token.value === 'null') return { type: 'null' };
        return null;
      default:
        this.pos++;
        return null;
    }
  }

  private parseArray(): PDFArray {
    this.pos++; // Skip '['
    const arr: PDFValue[] = [];

    while (this.pos < this.tokens.length) {
      if (this.tokens[this.pos].type === 'arrayEnd') {
        this.pos++;
        break;
      }
      const value = this.parseValue();
      if (value !== null) {
        arr.push(value);
      }
    }

    return { type: 'array', value: arr };
  }

  private parseDict(): PDFDict {
    this.pos++; // Skip '<<'
    const dict = new Map<string, PDFValue>();
    let key: string | null = null;

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos];

      if (token.type === 'dictEnd') {
        this.pos++;
        break;
      }

      if (key === null) {
        // Expecting a name key; anything else is skipped
        if (token.type === 'name') {
          key = token.value;
        }
        this.pos++;
        continue;
      }

      const value = this.parseValue();
      if (value !== null) {
        dict.set(key, value);
        key = null;
      }
    }

    return { type: 'dict', value: dict };
  }

  private isLiteralKeyword(keyword: string): boolean {
    return keyword === 'true' || keyword === 'false' || keyword === 'null';
  }
}

/**
 * Parse decoded stream bytes into operators
 */
export function parseContentStream(data: Uint8Array): PDFOperator[] {
  return new ContentStreamParser(data).parse();
}
