import { describe, it, expect } from 'vitest';
import { learnPatterns } from '../../src/comments/pattern-learner.js';

describe('learnPatterns', () => {
  it('classifies header, variable and control-flow comments', () => {
    const source = [
      '/* @file demo.c */',
      'int count = 0; // Number of items',
      '// Loop over items',
      'for (int i = 0; i < count; i++) {',
      '}',
      'x = 1; //',
    ].join('\n');

    const learned = learnPatterns(source);

    expect(learned.commentsFound).toBe(4);
    expect(learned.entries).toEqual([
      { category: 'header', key: null, comment: '/* @file demo.c */', context: null },
      { category: 'variable', key: 'int', comment: 'Number of items', context: 'int count = 0;' },
      {
        category: 'control_flow',
        key: 'for',
        comment: 'Loop over items',
        context: 'for (int i = 0; i < count; i++) {',
      },
    ]);
  });

  it('matches control-flow keywords as line prefixes', () => {
    const source = ['// Render output', 'format(buf);', 'iffy = 2; // Flag'].join('\n');

    expect(learnPatterns(source)).toEqual({
      commentsFound: 2,
      entries: [
        { category: 'control_flow', key: 'for', comment: 'Render output', context: 'format(buf);' },
        { category: 'control_flow', key: 'if', comment: 'Flag', context: 'iffy = 2;' },
      ],
    });
  });

  it('attaches block comments to the function or type that follows', () => {
    const lines: string[] = Array.from({ length: 10 }, () => '');
    lines.push(
      '/* Creates a widget */',
      'Widget make_widget(int size) {',
      '}',
      '/*',
      ' * Point in space',
      ' */',
      '',
      'struct Point {',
    );

    const learned = learnPatterns(lines.join('\n'));

    expect(learned.commentsFound).toBe(2);
    expect(learned.entries).toEqual([
      {
        category: 'function',
        key: null,
        comment: '/* Creates a widget */',
        context: 'Widget make_widget(int size) {',
      },
      {
        category: 'data_structure',
        key: null,
        comment: '/*\n* Point in space\n*/',
        context: 'struct Point {',
      },
    ]);
  });

  it('falls back to general for other end-of-line comments', () => {
    expect(learnPatterns('call(); // side effect').entries).toEqual([
      { category: 'general', key: null, comment: 'side effect', context: null },
    ]);
  });

  it('accepts CRLF line endings', () => {
    const learned = learnPatterns('int a = 1; // one\r\nfloat b = 2; // two');
    expect(learned.entries.map((e) => [e.key, e.comment])).toEqual([
      ['int', 'one'],
      ['float', 'two'],
    ]);
  });
});
