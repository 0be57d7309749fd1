/**
 * ICS content-line helper tests
 */

import {
  escapeText,
  foldLine,
  formatUtcOffset,
  parseContentLine,
  splitTextList,
  unescapeText,
  unfoldLines,
} from '../../src/ics/ics-text.js';

describe('ics-text', () => {
  describe('escapeText', () => {
    it('should escape backslash, semicolon, comma and newlines', () => {
      expect(escapeText('a\\b;c,d\ne')).toBe(String.raw`a\\b\;c\,d\ne`);
    });

    it('should turn CRLF into a single escaped newline', () => {
      expect(escapeText('one\r\ntwo')).toBe(String.raw`one\ntwo`);
    });
  });

  describe('unescapeText', () => {
    it('should reverse escaping, accepting upper-case N', () => {
      expect(unescapeText(String.raw`a\\b\;c\,d\ne\Nf`)).toBe('a\\b;c,d\ne\nf');
    });
  });

  describe('splitTextList', () => {
    it('should split on unescaped commas only', () => {
      expect(splitTextList(String.raw`Work\, Home,Personal`)).toEqual(['Work, Home', 'Personal']);
    });
  });

  describe('foldLine', () => {
    it('should leave short lines alone', () => {
      expect(foldLine('SUMMARY:Standup')).toBe('SUMMARY:Standup');
    });

    it('should fold at 75 octets with a leading space on continuations', () => {
      const line = 'DESCRIPTION:' + 'x'.repeat(100);
      const physical = foldLine(line).split('\r\n');

      expect(physical).toHaveLength(2);
      expect(physical[0]).toHaveLength(75);
      expect(physical[1]).toBe(' ' + 'x'.repeat(37));
    });

    it('should never split a multi-byte character', () => {
      const line = 'SUMMARY:' + 'é'.repeat(40);
      const physical = foldLine(line).split('\r\n');

      expect(physical[0]).toBe('SUMMARY:' + 'é'.repeat(33));
      expect(physical[1]).toBe(' ' + 'é'.repeat(7));
      expect(physical.every((part) => Buffer.byteLength(part, 'utf8') <= 75)).toBe(true);
    });
  });

  describe('unfoldLines', () => {
    it('should join continuations and drop empty lines', () => {
      expect(unfoldLines('A:1\r\nB:2\r\n  x\r\n\r\nC:3')).toEqual(['A:1', 'B:2 x', 'C:3']);
    });

    it('should restore a folded line', () => {
      const line = 'SUMMARY:' + 'é'.repeat(40);
      expect(unfoldLines(foldLine(line))).toEqual([line]);
    });
  });

  describe('parseContentLine', () => {
    it('should parse name, parameters and value', () => {
      const parsed = parseContentLine('DTSTART;TZID=Europe/Berlin:20260310T090000');

      expect(parsed?.name).toBe('DTSTART');
      expect(parsed?.params.get('TZID')).toBe('Europe/Berlin');
      expect(parsed?.value).toBe('20260310T090000');
    });

    it('should skip colons inside quoted parameter values', () => {
      const parsed = parseContentLine('ATTENDEE;CN="Doe: Jane":mailto:jane@example.test');

      expect(parsed?.params.get('CN')).toBe('Doe: Jane');
      expect(parsed?.value).toBe('mailto:jane@example.test');
    });

    it('should upper-case names', () => {
      expect(parseContentLine('summary:Lunch')?.name).toBe('SUMMARY');
    });

    it('should return null without a value separator', () => {
      expect(parseContentLine('no separator')).toBeNull();
    });
  });

  describe('formatUtcOffset', () => {
    it.each([
      [60, '+0100'],
      [-300, '-0500'],
      [330, '+0530'],
      [0, '+0000'],
    ])('should format %i minutes as %s', (minutes, expected) => {
      expect(formatUtcOffset(minutes)).toBe(expected);
    });
  });
});
