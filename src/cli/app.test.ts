/**
 * Tests for argument parsing and command dispatch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../utils/logger.js';
import { createCliApp, parseArgs, runCli } from './app.js';
import { CliUsageError } from './errors.js';

describe('parseArgs', () => {
  it('should split positionals from flags', () => {
    expect(parseArgs(['a.yaml', '--compact', '--debug', '--format=yaml'])).toEqual({
      positionals: ['a.yaml'],
      flags: { pretty: false, debug: true, format: 'yaml' },
    });
  });

  it('should read the format from the next argument', () => {
    expect(parseArgs(['--format', 'tree', 'a.yaml']).flags).toEqual({ format: 'tree' });
  });

  it('should treat everything after -- as positional', () => {
    expect(parseArgs(['--', '--format', '-x']).positionals).toEqual(['--format', '-x']);
  });

  it('should treat a lone dash as positional', () => {
    expect(parseArgs(['-']).positionals).toEqual(['-']);
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['-x'])).toThrow(new CliUsageError('Unknown option: -x'));
  });

  it('should reject an invalid format value', () => {
    expect(() => parseArgs(['--format', 'xml'])).toThrow(
      "Invalid value for --format: expected one of json, yaml, tree, got 'xml'"
    );
  });

  it('should reject a missing format value', () => {
    expect(() => parseArgs(['--format'])).toThrow(
      "Invalid value for --format: expected one of json, yaml, tree, got ''"
    );
  });
});

describe('createCliApp', () => {
  it('should resolve configuration from flags and environment', () => {
    const context = createCliApp(['a.yaml', '--debug'], { OPENCLI_FORMAT: 'tree' });

    expect(context.args).toEqual(['a.yaml']);
    expect(context.config).toEqual({ format: 'tree', pretty: true, debug: true });
    expect(context.logger).toBeInstanceOf(Logger);
  });
});

describe('runCli', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function errorOutput(): string {
    return errorSpy.mock.calls.map((call) => call.map(String).join(' ')).join('\n');
  }

  it('should show help when no command is given', () => {
    expect(runCli([], {})).toEqual({ exitCode: 0 });
    const help = String(logSpy.mock.calls[0]?.[0]);
    expect(help).toContain('opencli - inspect OpenCLI documents');
    expect(help).toContain('\n  OPENCLI_DEBUG   Write debug log entries to stderr (true/false)\n');
  });

  it.each(['help', '--help', '-h'])('should show help for %s', (command) => {
    expect(runCli([command], {}).exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it('should show help for inspect --help without loading anything', () => {
    expect(runCli(['inspect', 'missing.yaml', '--help'], {})).toEqual({ exitCode: 0 });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it.each(['version', '--version', '-v'])('should print the version for %s', (command) => {
    expect(runCli([command], {})).toEqual({ exitCode: 0 });
    expect(logSpy).toHaveBeenCalledWith('opencli v0.1.0');
  });

  it('should report an unknown command as a usage error', () => {
    expect(runCli(['frobnicate'], {})).toEqual({
      exitCode: 1,
      message: 'Unknown command: frobnicate',
    });
    expect(errorOutput()).toBe(
      'Error: Unknown command: frobnicate\n\nRun "opencli help" for usage information.'
    );
  });

  it('should report a missing path as a usage error', () => {
    expect(runCli(['inspect'], {})).toEqual({
      exitCode: 1,
      message: 'Missing path to OpenCLI document',
    });
  });

  it('should report extra positionals as a usage error', () => {
    expect(runCli(['inspect', 'a.yaml', 'b.yaml'], {}).message).toBe('Unexpected argument: b.yaml');
  });

  it('should report an invalid environment value as a usage error', () => {
    const result = runCli(['inspect', 'a.yaml'], { OPENCLI_DEBUG: 'maybe' });

    expect(result.exitCode).toBe(1);
    expect(errorOutput()).toContain('Run "opencli help" for usage information.');
  });
});
