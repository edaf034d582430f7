import { describe, it, expect } from 'vitest';
import { Roff, escapeCell, escapeLiteral, guardLine, quoteArgument, readLiteralLines } from '../src/render/roff.js';

describe('Roff', () => {
  it('writes one sentence per line and drops edge paragraphs', () => {
    expect(new Roff().macro('PP').text('Hello. World.').macro('PP').toString()).toBe('Hello.\nWorld.');
  });

  it('drops a paragraph break right after a heading', () => {
    expect(new Roff().macro('SH', 'NAME').macro('PP').text('x').toString()).toBe('.SH NAME\nx');
  });

  it('joins neighbouring text entries before segmenting', () => {
    expect(new Roff().text('One ').text('sentence').text('. Two.').toString()).toBe('One sentence.\nTwo.');
  });

  it('moves punctuation after a link onto the .UE line', () => {
    const roff = new Roff()
      .text('See')
      .macro('UR', 'https://example.com')
      .text('docs')
      .macro('UE')
      .text('. Next sentence.');
    expect(roff.toString()).toBe('See\n.UR https://example.com\ndocs\n.UE .\nNext sentence.');
  });

  it('guards text lines that would read as requests', () => {
    expect(new Roff().text('.hidden line').toString()).toBe('\\&.hidden line');
  });

  it('renames paragraph macros in a copy', () => {
    const roff = new Roff().text('x').macro('PP').text('y');
    expect(roff.renameMacro('PP', 'IP').toString()).toBe('x\n.IP\ny');
    expect(roff.toString()).toBe('x\n.PP\ny');
  });

  it('counts whitespace-only content as empty', () => {
    expect(new Roff().text('  ').isEmpty()).toBe(true);
    expect(new Roff().macro('PP').isEmpty()).toBe(false);
  });
});

describe('escaping', () => {
  it('guards control characters at line start', () => {
    expect(guardLine('.x')).toBe('\\&.x');
    expect(guardLine("'x")).toBe("\\&'x");
    expect(guardLine('"x')).toBe('\\&"x');
    expect(guardLine('x.')).toBe('x.');
  });

  it('escapes backslashes in literal lines', () => {
    expect(escapeLiteral('\\n')).toBe('\\&\\en');
    expect(escapeLiteral('a\\b')).toBe('a\\eb');
  });

  it('quotes arguments with spaces or quotes', () => {
    expect(quoteArgument('two words')).toBe('"two words"');
    expect(quoteArgument('')).toBe('""');
    expect(quoteArgument('a"b')).toBe('a\\(dqb');
    expect(quoteArgument('plain')).toBe('plain');
  });

  it('escapes bars in table cells', () => {
    expect(escapeCell('a|b')).toBe('a\\[ba]b');
  });

  it('recovers literal lines from a rendered page', () => {
    const lines = ['printf("\\n");', '.x', "'x", '\\e', '\\&x', '', '  indented'];
    const roff = new Roff().macro('EX');
    for (const line of lines) roff.literal(line);
    roff.macro('EE');
    expect(readLiteralLines(roff.toString())).toEqual([lines]);
  });
});
