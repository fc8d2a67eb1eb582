/**
 * Test Suite for command-line parsing
 */

import { describe, it, expect } from 'vitest';
import { InputError } from '@/types/errors';
import { parseCliArgs } from '../cliArgs';

describe('parseCliArgs', () => {
  it('should map a path and flags onto the request', () => {
    expect(
      parseCliArgs([
        'bulk-links-find-replace',
        './corpus',
        '--find',
        'old.example.com',
        '--replace',
        'https://new.example.com',
        '--target',
        'url',
        '--no-copies',
        '--config',
        'settings.json',
      ])
    ).toEqual({
      command: 'bulk-links-find-replace',
      request: {
        path: './corpus',
        findText: 'old.example.com',
        replaceText: 'https://new.example.com',
        target: 'url',
        saveCopies: false,
      },
      configFile: 'settings.json',
    });
  });

  it('should accept flags before the path', () => {
    expect(parseCliArgs(['find-replace', '--find', 'foo', 'report.docx'])).toEqual({
      command: 'find-replace',
      request: { findText: 'foo', path: 'report.docx' },
    });
  });

  it('should give export-links a default output file', () => {
    expect(parseCliArgs(['export-links', 'corpus']).request).toEqual({ path: 'corpus', outPath: 'links.xlsx' });
    expect(parseCliArgs(['export-links', 'corpus', '--out', 'out/l.xlsx']).request.outPath).toBe('out/l.xlsx');
  });

  it('should keep an empty replacement', () => {
    expect(parseCliArgs(['find-replace', 'a.docx', '--find', 'x', '--replace', '']).request.replaceText).toBe('');
  });

  it.each([
    [[], 'No command given'],
    [['rename', 'x'], 'Unknown command: rename'],
    [['scan', 'a', 'b'], 'Unexpected argument: b'],
    [['scan', 'a', '--verbose'], 'Unknown option: --verbose'],
    [['find-replace', 'a.docx', '--find'], 'Missing value for --find'],
    [['find-replace', 'a.docx', '--find', '--replace', 'y'], 'Missing value for --find'],
  ])('should reject %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new InputError(message));
  });
});
