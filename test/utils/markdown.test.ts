import { describe, it, expect } from 'vitest';
import { buildTable, escapeInlineCode, escapeListItem, escapeTableCell } from '../../src/utils/markdown.js';

describe('utils/markdown', () => {
  describe('escapeTableCell', () => {
    it('should escape pipes and line breaks', () => {
      expect(escapeTableCell('app|users\nshard')).toBe('app\\|users<br>shard');
      expect(escapeTableCell('line1\r\nline2')).toBe('line1<br>line2');
    });

    it('should trim whitespace', () => {
      expect(escapeTableCell('  0.7500  ')).toBe('0.7500');
    });

    it('should handle empty strings', () => {
      expect(escapeTableCell('')).toBe('');
    });
  });

  describe('escapeInlineCode', () => {
    it('should wrap diff paths in backticks', () => {
      expect(escapeInlineCode('$.commandResults[0].n')).toBe('`$.commandResults[0].n`');
    });

    it('should use a double fence for text containing backticks', () => {
      expect(escapeInlineCode('field `a`')).toBe('`` field `a` ``');
    });

    it('should handle empty strings', () => {
      expect(escapeInlineCode('')).toBe('``');
    });
  });

  describe('escapeListItem', () => {
    it('should escape leading list markers', () => {
      expect(escapeListItem('- item')).toBe('\\- item');
      expect(escapeListItem('* item')).toBe('\\* item');
      expect(escapeListItem('1. item')).toBe('1\\. item');
    });

    it('should keep continuation lines inside the item', () => {
      expect(escapeListItem('write failed\ncode=11000')).toBe('write failed  \n  code=11000');
    });

    it('should leave other text alone', () => {
      expect(escapeListItem('artifact overallStatus=FAIL')).toBe('artifact overallStatus=FAIL');
    });
  });

  describe('buildTable', () => {
    it('should build a table with alignments', () => {
      expect(buildTable(['rank', 'namespace', 'score'], [['1', 'app.users', '0.7500']], ['right', 'left', 'right'])).toBe(
        ['| rank | namespace | score |', '| ---: | --- | ---: |', '| 1 | app.users | 0.7500 |'].join('\n')
      );
    });

    it('should default to left alignment', () => {
      expect(buildTable(['a', 'b', 'c'], []).split('\n')[1]).toBe('| --- | --- | --- |');
      expect(buildTable(['a', 'b'], [], ['center']).split('\n')[1]).toBe('| :---: | --- |');
    });

    it('should escape cells and pad short rows', () => {
      expect(buildTable(['A | B', 'C', 'D'], [['x|y']]).split('\n')).toEqual([
        '| A \\| B | C | D |',
        '| --- | --- | --- |',
        '| x\\|y |  |  |',
      ]);
    });
  });
});
