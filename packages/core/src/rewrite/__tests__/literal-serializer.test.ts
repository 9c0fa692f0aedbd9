import { describe, it, expect } from 'vitest';

import type { Field } from '../../types/literal.js';
import { detectLayout, serializeLiteral } from '../literal-serializer.js';

function spanIn(text: string) {
  return {
    tagOffset: text.indexOf('ParseError'),
    start: text.indexOf('{'),
    end: text.lastIndexOf('}'),
  };
}

function field(name: string, rawValue: string, comments: string[] = []): Field {
  return { name, rawValue, firstSeenIndex: 0, comments };
}

describe('detectLayout', () => {
  it('keeps the indentation of a first field on its own line', () => {
    const text = '    let e = ParseError {\n        message: x }';
    expect(detectLayout(text, spanIn(text), '    ')).toEqual({
      openIndent: '    ',
      fieldIndent: '        ',
    });
  });

  it('indents one unit past the opening line for an inline literal', () => {
    const text = '        return ParseError { a: 1 };';
    expect(detectLayout(text, spanIn(text), '    ')).toEqual({
      openIndent: '        ',
      fieldIndent: '            ',
    });
  });

  it('uses the configured unit when nothing else is known', () => {
    const text = 'ParseError { a: 1 }';
    expect(detectLayout(text, spanIn(text), '  ').fieldIndent).toBe('  ');
  });

  it('keeps tab indentation', () => {
    const text = '\tParseError {\n\t\tmessage: x\n\t}';
    expect(detectLayout(text, spanIn(text), '    ')).toEqual({
      openIndent: '\t',
      fieldIndent: '\t\t',
    });
  });
});

describe('serializeLiteral', () => {
  it('writes one field per line with a trailing comma', () => {
    const out = serializeLiteral(
      [field('message', '"oops"'), field('position', '4'), field('context', 'none')],
      { openIndent: '', fieldIndent: '    ' }
    );

    expect(out).toBe(
      '{\n    message: "oops",\n    position: 4,\n    context: none,\n}'
    );
  });

  it('places comments and uses the given line ending', () => {
    const out = serializeLiteral(
      [field('a', '1', ['// c'])],
      { openIndent: '  ', fieldIndent: '    ' },
      ['// t'],
      '\r\n'
    );

    expect(out).toBe('{\r\n    // c\r\n    a: 1,\r\n    // t\r\n  }');
  });
});
