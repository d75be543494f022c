// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { QueryRejectedError } from '@opsdeck/shared';
import type { QueryArgument, QueryChain, Token, VerbCall } from './types.js';
import { toValueHelper } from './verbs.js';

// ============================================================================
// Lexer
// ============================================================================

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const NUMBER_LITERAL = /^-?(\d+(\.\d+)?|\.\d+)([eE][+-]?\d+)?/;
const PUNCTUATION = new Set(['(', ')', ',', '[', ']', ';']);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Split a query expression into tokens. String literals become single tokens,
 * so nothing inside quotes is ever read as a verb.
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < expression.length) {
    const char = expression[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '-' && expression[index + 1] === '>') {
      tokens.push({ type: 'arrow', value: '->', position: index });
      index += 2;
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ type: 'punct', value: char, position: index });
      index += 1;
      continue;
    }

    if (char === "'" || char === '"') {
      const start = index;
      let value = '';
      index += 1;
      let closed = false;
      while (index < expression.length) {
        const current = expression[index];
        if (current === '\\') {
          const next = expression[index + 1];
          if (next === undefined) break;
          value += ESCAPES[next] ?? next;
          index += 2;
          continue;
        }
        if (current === char) {
          closed = true;
          index += 1;
          break;
        }
        value += current;
        index += 1;
      }
      if (!closed) {
        throw QueryRejectedError.malformed(`unterminated string starting at position ${start}`);
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    const numberMatch = NUMBER_LITERAL.exec(expression.slice(index));
    if (numberMatch && (char !== '-' || /[\d.]/.test(expression[index + 1] ?? ''))) {
      tokens.push({ type: 'number', value: numberMatch[0], position: index });
      index += numberMatch[0].length;
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const start = index;
      while (index < expression.length && IDENTIFIER_PART.test(expression[index])) {
        index += 1;
      }
      tokens.push({ type: 'identifier', value: expression.slice(start, index), position: start });
      continue;
    }

    throw QueryRejectedError.malformed(`unexpected character '${char}' at position ${index}`);
  }

  return tokens;
}

/**
 * Names written directly before "(", in order of appearance.
 */
export function invokedNames(tokens: Token[]): string[] {
  const names: string[] = [];
  tokens.forEach((token, index) => {
    const next = tokens[index + 1];
    if (token.type === 'identifier' && next?.type === 'punct' && next.value === '(') {
      names.push(token.value);
    }
  });
  return names;
}

// ============================================================================
// Parser
// ============================================================================

class ChainParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): QueryChain {
    if (this.tokens.length === 0) {
      throw QueryRejectedError.malformed('query is empty');
    }

    const calls: VerbCall[] = [this.parseCall()];

    while (!this.atEnd()) {
      const token = this.peek();
      if (token?.type === 'arrow') {
        this.index += 1;
        calls.push(this.parseCall());
        continue;
      }
      if (token?.type === 'punct' && token.value === ';') {
        this.index += 1;
        if (!this.atEnd()) {
          throw this.unexpected('only one statement is allowed');
        }
        break;
      }
      throw this.unexpected('expected "->" between calls');
    }

    return { calls };
  }

  private parseCall(): VerbCall {
    const name = this.expect('identifier', 'expected a method name');
    this.expectPunct('(');
    const args = this.parseArguments(')');
    return { verb: name.value, args, position: name.position };
  }

  private parseArguments(closing: ')' | ']'): QueryArgument[] {
    const args: QueryArgument[] = [];
    if (this.isPunct(closing)) {
      this.index += 1;
      return args;
    }

    for (;;) {
      args.push(this.parseArgument());
      if (this.isPunct(',')) {
        this.index += 1;
        continue;
      }
      this.expectPunct(closing);
      return args;
    }
  }

  private parseArgument(): QueryArgument {
    const token = this.next('expected an argument');

    switch (token.type) {
      case 'string':
        return token.value;
      case 'number':
        return Number(token.value);
      case 'punct':
        if (token.value === '[') {
          return this.parseArguments(']');
        }
        break;
      case 'identifier': {
        const lowered = token.value.toLowerCase();
        if (lowered === 'true') return true;
        if (lowered === 'false') return false;
        if (lowered === 'null') return null;
        const helper = toValueHelper(token.value);
        if (helper && this.isPunct('(')) {
          this.index += 1;
          this.expectPunct(')');
          return { helper };
        }
        break;
      }
      case 'arrow':
        break;
    }

    throw QueryRejectedError.malformed(`unexpected '${token.value}' at position ${token.position}`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  private next(expectation: string): Token {
    const token = this.peek();
    if (!token) {
      throw QueryRejectedError.malformed(`${expectation} but the query ended`);
    }
    this.index += 1;
    return token;
  }

  private expect(type: Token['type'], expectation: string): Token {
    const token = this.next(expectation);
    if (token.type !== type) {
      throw QueryRejectedError.malformed(`${expectation} at position ${token.position}`);
    }
    return token;
  }

  private isPunct(value: string): boolean {
    const token = this.peek();
    return token?.type === 'punct' && token.value === value;
  }

  private expectPunct(value: string): void {
    const token = this.next(`expected '${value}'`);
    if (token.type !== 'punct' || token.value !== value) {
      throw QueryRejectedError.malformed(`expected '${value}' at position ${token.position}`);
    }
  }

  private unexpected(reason: string): QueryRejectedError {
    const token = this.peek();
    const where = token ? ` at position ${token.position}` : '';
    return QueryRejectedError.malformed(`${reason}${where}`);
  }
}

/**
 * Parse a method chain such as `where('age', '>', 18)->orderBy('name')->get()`.
 * Anything outside the grammar is rejected.
 */
export function parseChain(tokens: Token[]): QueryChain {
  return new ChainParser(tokens).parse();
}

export function parseQuery(expression: string): QueryChain {
  return parseChain(tokenize(expression));
}
