/**
 * Tests for config command
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';

vi.mock('../../../config/index.js', async () => {
  const actual = await vi.importActual<typeof import('../../../config/index.js')>('../../../config/index.js');
  return {
    ...actual,
    getConfigValue: vi.fn(),
    setConfigValue: vi.fn(),
    listConfig: vi.fn(),
    getConfigPath: vi.fn(() => '/home/test/.docchat/config.toml'),
  };
});

import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { getConfigValue, listConfig, setConfigValue } from '../../../config/index.js';
import { ConfigError } from '../../../errors/index.js';

describe('createConfigCommand', () => {
  let logOutput: string[];
  let errorOutput: string[];
  let mockContext: CommandContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logOutput = [];
    errorOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: (msg: string) => errorOutput.push(msg),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    vi.clearAllMocks();
    process.exitCode = undefined;
  });

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createConfigCommand(() => context));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  it('prints a value', async () => {
    vi.mocked(getConfigValue).mockReturnValue(5);

    await runCommand(['get', 'retrieval.top_k']);

    expect(getConfigValue).toHaveBeenCalledWith('retrieval.top_k');
    expect(logOutput).toEqual(['5']);
  });

  it('reports unknown keys', async () => {
    vi.mocked(getConfigValue).mockReturnValue(undefined);

    await runCommand(['get', 'nope']);

    expect(errorOutput).toEqual(['Unknown config key: nope']);
    expect(process.exitCode).toBe(1);
  });

  it('sets a value', async () => {
    await runCommand(['set', 'retrieval.top_k', '8']);

    expect(setConfigValue).toHaveBeenCalledWith('retrieval.top_k', '8');
    expect(logOutput).toEqual(['✓ Set retrieval.top_k = 8']);
  });

  it('shows validation errors from set', async () => {
    vi.mocked(setConfigValue).mockImplementation(() => {
      throw new ConfigError('Invalid configuration:\n  - retrieval.top_k: Number must be less than or equal to 50');
    });

    await runCommand(['set', 'retrieval.top_k', '99']);

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining('retrieval.top_k: Number must be less than or equal to 50')
    );
    expect(process.exitCode).toBe(1);
  });

  it('lists values grouped by section', async () => {
    vi.mocked(listConfig).mockReturnValue([
      ['default_model', ''],
      ['temperature', 1],
      ['retrieval.top_k', 5],
      ['web_search.results', 5],
    ]);

    await runCommand(['list']);

    expect(logOutput).toEqual([
      'Configuration:',
      '',
      '  default_model = ""',
      '  temperature = 1',
      '',
      '  retrieval.top_k = 5',
      '',
      '  web_search.results = 5',
      '',
      'Config file: /home/test/.docchat/config.toml',
    ]);
  });

  it('prints the config path', async () => {
    await runCommand(['path']);

    expect(logOutput).toEqual(['/home/test/.docchat/config.toml']);
  });

  it('asks for --force before resetting', async () => {
    await runCommand(['reset']);

    expect(logOutput[0]).toBe('This will reset all configuration to defaults.');
    expect(process.exitCode).toBe(1);
  });
});

describe('formatValue', () => {
  it('formats scalars and objects', () => {
    expect(formatValue('hash')).toBe('hash');
    expect(formatValue('')).toBe('""');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(0.01)).toBe('0.01');
    expect(formatValue(['a'])).toBe('["a"]');
  });
});
