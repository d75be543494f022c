import { describe, expect, it } from 'vitest';
import { parseQuery, tokenize } from './parser.js';

function verbsAndArgs(expression: string) {
  return parseQuery(expression).calls.map(({ verb, args }) => ({ verb, args }));
}

describe('tokenize', () => {
  it('produces identifier and punctuation tokens with positions', () => {
    expect(tokenize('count()')).toEqual([
      { type: 'identifier', value: 'count', position: 0 },
      { type: 'punct', value: '(', position: 5 },
      { type: 'punct', value: ')', position: 6 },
    ]);
  });

  it('reads arrows, numbers and strings', () => {
    expect(tokenize("take(-2)->x('a b')").map((token) => [token.type, token.value])).toEqual([
      ['identifier', 'take'],
      ['punct', '('],
      ['number', '-2'],
      ['punct', ')'],
      ['arrow', '->'],
      ['identifier', 'x'],
      ['punct', '('],
      ['string', 'a b'],
      ['punct', ')'],
    ]);
  });

  it('rejects an unterminated string', () => {
    expect(() => tokenize("where('a")).toThrowError(
      'Query could not be parsed: unterminated string starting at position 6',
    );
  });
});

describe('parseQuery', () => {
  it('parses a chain of calls', () => {
    expect(verbsAndArgs("where('age', '>=', 18)->orderBy(\"name\")->take(5);")).toEqual([
      { verb: 'where', args: ['age', '>=', 18] },
      { verb: 'orderBy', args: ['name'] },
      { verb: 'take', args: [5] },
    ]);
  });

  it('parses lists, literals and helpers', () => {
    expect(
      verbsAndArgs("whereIn('id', [1, 2, -3.5])->where('d', '<', today())->where('x', null)->where('f', TRUE)->get()"),
    ).toEqual([
      { verb: 'whereIn', args: ['id', [1, 2, -3.5]] },
      { verb: 'where', args: ['d', '<', { helper: 'today' }] },
      { verb: 'where', args: ['x', null] },
      { verb: 'where', args: ['f', true] },
      { verb: 'get', args: [] },
    ]);
  });

  it('unescapes quotes inside strings', () => {
    expect(verbsAndArgs("where('name', 'O\\'Brien')->get()")[0].args).toEqual(['name', "O'Brien"]);
  });

  it('requires an arrow between calls', () => {
    expect(() => parseQuery("where('a', 1) get()")).toThrowError(
      'Query could not be parsed: expected "->" between calls at position 14',
    );
  });

  it('rejects helpers called with arguments', () => {
    expect(() => parseQuery("where('d', now(1))")).toThrowError("Query could not be parsed: expected ')' at position 15");
  });

  it('rejects bare identifiers as arguments', () => {
    expect(() => parseQuery("where('a', foo)->get()")).toThrowError(
      "Query could not be parsed: unexpected 'foo' at position 11",
    );
  });
});
