import { describe, it, expect } from 'vitest';
import { parsePriority } from '../../src/parsers/priority-parser.js';
import { parseExportFormat } from '../../src/parsers/format-parser.js';
import { Priority } from '../../src/types/priority.js';
import { ExportFormat } from '../../src/types/export-format.js';
import { ExportError, InvalidInputError } from '../../src/errors.js';

describe('parsePriority', () => {
  it.each([
    ['high', Priority.High],
    ['HIGH', Priority.High],
    ['p1', Priority.High],
    ['m', Priority.Medium],
    ['2', Priority.Medium],
    [' Low ', Priority.Low],
    ['p3', Priority.Low],
  ])('parses %j', (text, expected) => {
    expect(parsePriority(text)).toBe(expected);
  });

  it.each(['', 'urgent', 'p4', 'constructor'])('rejects %j', (text) => {
    expect(() => parsePriority(text)).toThrow(InvalidInputError);
  });
});

describe('parseExportFormat', () => {
  it.each([
    ['json', ExportFormat.Json],
    ['CSV', ExportFormat.Csv],
    ['yml', ExportFormat.Yaml],
    ['yaml', ExportFormat.Yaml],
    ['md', ExportFormat.Markdown],
    ['Markdown', ExportFormat.Markdown],
  ])('parses %j', (text, expected) => {
    expect(parseExportFormat(text)).toBe(expected);
  });

  it('rejects an unsupported tag with ExportError', () => {
    expect(() => parseExportFormat('xml')).toThrow(ExportError);
    expect(() => parseExportFormat('xml')).toThrow('Unsupported export format "xml"');
  });
});
