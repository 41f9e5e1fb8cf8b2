/**
 * Tests for CLI error formatting and exit codes.
 */

import { describe, it, expect } from 'vitest';
import { OpenCliLoadError } from '../loader/index.js';
import { EXIT_CODES, exitCodeForLoadError, formatLoadError } from './errors.js';

describe('exitCodeForLoadError', () => {
  it('should map each load error kind to its exit code', () => {
    expect(exitCodeForLoadError(new OpenCliLoadError('x', 'parse'))).toBe(2);
    expect(exitCodeForLoadError(new OpenCliLoadError('x', 'io'))).toBe(3);
    expect(exitCodeForLoadError(new OpenCliLoadError('x', 'other'))).toBe(4);
  });

  it('should keep success and usage distinct from load failures', () => {
    expect(EXIT_CODES.success).toBe(0);
    expect(EXIT_CODES.usage).toBe(1);
  });
});

describe('formatLoadError', () => {
  it('should format an io error with details and actions', () => {
    const error = new OpenCliLoadError('Failed to read OpenCLI document: boom', 'io', {
      details: 'Path: missing.yaml',
    });

    expect(formatLoadError(error)).toBe(
      [
        'Error: Failed to read OpenCLI document: boom',
        '  Details: Path: missing.yaml',
        '',
        'Suggestions:',
        '  1. Check that the path exists and is a readable file',
        '    ls -l <path>',
        '  2. Ensure the file is UTF-8 encoded',
        '    file <path>',
      ].join('\n')
    );
  });

  it('should format a parse error without details', () => {
    const error = new OpenCliLoadError('Failed to parse OpenCLI document: bad', 'parse');

    expect(formatLoadError(error)).toBe(
      [
        'Error: Failed to parse OpenCLI document: bad',
        '',
        'Suggestions:',
        '  1. Check that the document is valid YAML or JSON',
        "  2. Ensure 'opencli', 'info.title' and 'info.version' are present and are strings",
        '  3. YAML mistakes are reported by the JSON parser; lint the file as YAML if it is YAML',
      ].join('\n')
    );
  });

  it('should add ANSI codes only when colors are enabled', () => {
    const error = new OpenCliLoadError('Input is not valid UTF-8 text', 'other');

    expect(formatLoadError(error, { colors: false })).not.toContain('\x1b[');
    expect(formatLoadError(error, { colors: true }).startsWith('\x1b[31mError:\x1b[0m ')).toBe(
      true
    );
  });
});
