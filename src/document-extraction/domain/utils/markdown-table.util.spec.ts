import {
  isSeparatorRow,
  splitTableRow,
  toMarkdownTable,
  uniqueColumnNames,
} from './markdown-table.util';

describe('markdown-table.util', () => {
  describe('splitTableRow', () => {
    it('should split on pipes and trim cells', () => {
      expect(splitTableRow('|  a | b  |c|')).toEqual(['a', 'b', 'c']);
    });

    it('should accept rows without outer pipes', () => {
      expect(splitTableRow('a | b')).toEqual(['a', 'b']);
    });

    it('should keep escaped pipes inside a cell', () => {
      expect(splitTableRow('| a \\| b | c |')).toEqual(['a | b', 'c']);
    });
  });

  describe('isSeparatorRow', () => {
    it.each([
      [['---', '---']],
      [[':--', '--:']],
      [[':-:']],
    ])('should detect %j', (cells) => {
      expect(isSeparatorRow(cells)).toBe(true);
    });

    it('should not treat data as a separator', () => {
      expect(isSeparatorRow(['---', '4.00'])).toBe(false);
      expect(isSeparatorRow([])).toBe(false);
    });
  });

  describe('uniqueColumnNames', () => {
    it('should suffix repeated names in order', () => {
      expect(uniqueColumnNames(['a', 'a', 'b', 'a'])).toEqual([
        'a',
        'a.1',
        'b',
        'a.2',
      ]);
    });
  });

  describe('toMarkdownTable', () => {
    it('should render a header-only table', () => {
      expect(toMarkdownTable(['Item', 'Unit Price'])).toBe(
        '| Item | Unit Price |\n| --- | --- |',
      );
    });

    it('should escape pipes and flatten newlines in cells', () => {
      expect(toMarkdownTable(['a'], [{ a: 'x|y\nz' }])).toBe(
        '| a |\n| --- |\n| x\\|y z |',
      );
    });
  });
});
