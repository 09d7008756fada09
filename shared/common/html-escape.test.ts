import { describe, it, expect } from 'vitest';
import { escapeHtml } from './html-escape.js';

describe('escapeHtml', () => {
  it('returns printable ASCII unchanged', () => {
    expect(escapeHtml('Hello, world!')).toBe('Hello, world!');
  });

  it('returns an empty string for empty input', () => {
    expect(escapeHtml('')).toBe('');
  });

  it('escapes markup-significant characters', () => {
    expect(escapeHtml('<b>&</b>')).toBe('&lt;b&gt;&amp;&lt;/b&gt;');
  });

  it('leaves quotes untouched', () => {
    expect(escapeHtml(`it's "quoted"`)).toBe(`it's "quoted"`);
  });

  describe('numeric references', () => {
    it('encodes line feed and carriage return', () => {
      expect(escapeHtml('a\nb')).toBe('a&#10;b');
      expect(escapeHtml('a\r\nb')).toBe('a&#13;&#10;b');
    });

    it('encodes other control characters', () => {
      expect(escapeHtml('\t')).toBe('&#9;');
      expect(escapeHtml('\u007f')).toBe('&#127;');
    });

    it('keeps tilde as the last printable character', () => {
      expect(escapeHtml('~')).toBe('~');
    });

    it('encodes characters outside ASCII by their code unit', () => {
      expect(escapeHtml('café')).toBe('caf&#233;');
      expect(escapeHtml('漢字')).toBe('&#28450;&#23383;');
    });

    it('encodes a surrogate pair as one code point', () => {
      expect(escapeHtml('\u{1F600}')).toBe('&#128512;');
    });

    it('replaces lone surrogates with the replacement character', () => {
      expect(escapeHtml('a\uD83D')).toBe('a&#65533;');
      expect(escapeHtml('\uDE00b')).toBe('&#65533;b');
    });
  });

  describe('space runs', () => {
    it('keeps a single space as a space', () => {
      expect(escapeHtml('a b')).toBe('a b');
    });

    it('emits non-breaking spaces for all but the last space of a run', () => {
      expect(escapeHtml('x  y')).toBe('x&nbsp; y');
      expect(escapeHtml('   ')).toBe('&nbsp;&nbsp; ');
    });
  });
});
