import { describe, it, expect, afterEach } from 'vitest';
import { createCli, resolveLogLevel } from '../src/cli.js';
import { setLogLevel } from '../src/lib/logger.js';
import { runCLI } from './helpers/cli-runner.js';

describe('resolveLogLevel', () => {
  it('should default to info', () => {
    expect(resolveLogLevel({}, {})).toBe('info');
  });

  it('should map --verbose to debug and --quiet to error', () => {
    expect(resolveLogLevel({ verbose: true }, {})).toBe('debug');
    expect(resolveLogLevel({ quiet: true }, {})).toBe('error');
    expect(resolveLogLevel({ verbose: true, quiet: true }, {})).toBe('debug');
  });

  it('should read GRAPH_LOG_LEVEL', () => {
    expect(resolveLogLevel({}, { GRAPH_LOG_LEVEL: 'WARN' })).toBe('warn');
    expect(resolveLogLevel({ quiet: true }, { GRAPH_LOG_LEVEL: 'debug' })).toBe('error');
  });

  it('should ignore an unknown GRAPH_LOG_LEVEL', () => {
    expect(resolveLogLevel({}, { GRAPH_LOG_LEVEL: 'trace' })).toBe('info');
  });
});

describe('createCli', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('should register the fetch and auth commands', () => {
    expect(createCli().commands.map((command) => command.name())).toEqual(['fetch', 'auth']);
  });

  it('should fail on an unknown command', async () => {
    const result = await runCLI(['delete', 'users']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("unknown command 'delete'");
  });
});
