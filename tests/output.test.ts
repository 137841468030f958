import { describe, expect, it } from 'vitest';

import { classifyOutput, stripAnsi } from '../src/core/output/classifier.js';
import { ansiToHtml, renderOutput } from '../src/core/output/converter.js';
import { Logger } from '../src/utils/logger.js';

describe('classifyOutput', () => {
  it('leaves plain text undecorated', () => {
    expect(classifyOutput('name,size\nfoo,12\n')).toEqual({ decorated: false, markers: [] });
  });

  it('detects colour escapes', () => {
    expect(classifyOutput('\u001b[31mred\u001b[0m')).toEqual({ decorated: true, markers: ['ansi'] });
  });

  it('detects OSC sequences such as hyperlinks', () => {
    expect(classifyOutput('\u001b]8;;https://example.test\u0007link\u001b]8;;\u0007').markers).toEqual(['ansi']);
  });

  it('detects box-drawing tables', () => {
    expect(classifyOutput('┌──┐\n│a │\n└──┘')).toEqual({ decorated: true, markers: ['box_drawing'] });
  });

  it('reports both markers together', () => {
    expect(classifyOutput('\u001b[1m│\u001b[0m').markers).toEqual(['ansi', 'box_drawing']);
  });
});

describe('stripAnsi', () => {
  it('keeps only visible text', () => {
    expect(stripAnsi('\u001b[1;32mok\u001b[0m done')).toBe('ok done');
  });
});

describe('renderOutput', () => {
  it('returns undecorated text unchanged', () => {
    const text = 'plain output\n';
    const rendered = renderOutput(text);
    expect(rendered).toEqual({ kind: 'plain', text });
    expect(rendered.kind === 'plain' && rendered.text).toBe(text);
  });

  it('converts colour escapes to styled spans', () => {
    expect(renderOutput('\u001b[31mred\u001b[0m')).toEqual({ kind: 'markup', html: '<span style="color:#A00">red</span>' });
  });

  it('escapes HTML in decorated output', () => {
    expect(ansiToHtml('\u001b[1m<b>&\u001b[0m')).toBe('<b>&lt;b&gt;&amp;</b>');
  });

  it('falls back to plain text when conversion throws', () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', write: (l) => lines.push(l) });
    const rendered = renderOutput('│ cell │', {
      logger,
      convert: () => {
        throw new Error('converter exploded');
      }
    });

    expect(rendered).toEqual({ kind: 'plain', text: '│ cell │' });
    expect(lines[0]).toContain('output conversion failed; keeping plain text');
  });
});
