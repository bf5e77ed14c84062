/**
 * Tests for ask command
 *
 * Tests cover:
 * - Command structure and options
 * - Question and option validation
 * - Streaming text output and JSON output
 * - Completion failures
 * - --context-only prompt output
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

vi.mock('../../utils/runtime.js', async () => {
  const actual = await vi.importActual<typeof import('../../utils/runtime.js')>('../../utils/runtime.js');
  return { ...actual, createChatRuntime: vi.fn(), createRetrieval: vi.fn() };
});

vi.mock('../../../config/index.js', async () => {
  const actual = await vi.importActual<typeof import('../../../config/index.js')>('../../../config/index.js');
  return { ...actual, loadConfig: vi.fn() };
});

import { createAskCommand } from '../ask.js';
import type { CommandContext } from '../../types.js';
import { createChatRuntime, createRetrieval } from '../../utils/runtime.js';
import { ChatSession } from '../../../agent/chat-session.js';
import { augmentUserMessage } from '../../../agent/prompts.js';
import { DEFAULT_CONFIG, loadConfig } from '../../../config/index.js';
import { CLIError, CompletionError } from '../../../errors/index.js';
import { HashEmbedder } from '../../../indexer/embedder/index.js';
import { RetrievalSession } from '../../../search/store.js';
import {
  ScriptedCompletionService,
  createWordTokenizer,
  type ScriptedReply,
} from '../../../test-utils/index.js';

const MODEL = {
  id: 'vendor/alpha:free',
  name: 'Alpha',
  contextLength: 8192,
  pricing: { prompt: 0, completion: 0 },
};

describe('createAskCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let written: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>;
  let completion: ScriptedCompletionService;
  let session: ChatSession;

  function useReplies(replies: Array<ScriptedReply | string>): void {
    completion = new ScriptedCompletionService(replies);
    session = new ChatSession({
      completion,
      retrieval: new RetrievalSession({ embedder: new HashEmbedder(), logger: mockContext }),
      logger: mockContext,
      tokenizer: createWordTokenizer(),
    });
    vi.mocked(createChatRuntime).mockResolvedValue({
      config: DEFAULT_CONFIG,
      session,
      models: [MODEL],
      model: MODEL,
      temperature: 0.5,
    });
  }

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logOutput = [];
    written = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });

    vi.mocked(loadConfig).mockReturnValue(DEFAULT_CONFIG);
    vi.mocked(createRetrieval).mockImplementation(
      async () => new RetrievalSession({ embedder: new HashEmbedder(), logger: mockContext })
    );
    useReplies(['Blue.']);
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    stdoutWriteSpy.mockRestore();
  });

  async function runCommand(args: string[], context = mockContext) {
    const command = createAskCommand(() => context);
    const program = new Command();
    program.addCommand(command);
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  describe('command structure', () => {
    it('creates a command named "ask" with a required question', () => {
      const command = createAskCommand(() => mockContext);
      expect(command.name()).toBe('ask');
      expect(command.registeredArguments).toHaveLength(1);
      expect(command.registeredArguments[0]?.required).toBe(true);
    });

    it('has file, search and context-only options', () => {
      const command = createAskCommand(() => mockContext);
      const longs = command.options.map((o) => o.long);
      expect(longs).toEqual(
        expect.arrayContaining(['--file', '--search', '--search-query', '--top-k', '--context-only'])
      );
    });
  });

  describe('validation', () => {
    it('rejects an empty question', async () => {
      await expect(runCommand(['   '])).rejects.toThrow(CLIError);
      expect(createChatRuntime).not.toHaveBeenCalled();
    });

    it('rejects an invalid --top-k', async () => {
      await expect(runCommand(['Question', '--top-k', '0'])).rejects.toThrow('Invalid --top-k value: "0"');
    });
  });

  describe('answering', () => {
    it('streams the answer and passes the options through', async () => {
      await runCommand(['  What color is the sky?  ', '--top-k', '3', '--model', 'alpha']);

      expect(createChatRuntime).toHaveBeenCalledWith(mockContext, {
        model: 'alpha',
        temperature: undefined,
        topK: 3,
      });
      expect(written).toEqual(['Blue.']);
      expect(completion.calls[0]?.request).toEqual({ model: 'vendor/alpha:free', temperature: 0.5 });
      expect(session.history[0]).toEqual({ role: 'user', content: 'What color is the sky?' });
    });

    it('prints JSON with the answer and cited sources', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docchat-ask-'));
      const filePath = path.join(dir, 'sky.txt');
      fs.writeFileSync(filePath, 'The sky is blue. Water is wet.');

      try {
        await runCommand(['what color is the sky', '--file', filePath], {
          ...mockContext,
          options: { verbose: false, json: true },
        });
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }

      expect(written).toEqual([]);
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output).toEqual({
        question: 'what color is the sky',
        answer: 'Blue.',
        model: 'vendor/alpha:free',
        searchQuery: '',
        searchResults: [],
        sources: ['D1-1'],
      });
    });

    it('throws CompletionError when the model fails', async () => {
      useReplies([{ deltas: ['Bl'], error: new Error('upstream timeout') }]);

      await expect(runCommand(['Question'])).rejects.toThrow(CompletionError);
      expect(session.history[1]).toEqual({
        role: 'assistant',
        content: 'Bl\n\nError: upstream timeout',
      });
    });
  });

  describe('--context-only', () => {
    it('prints the assembled prompt without calling the model', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docchat-ask-'));
      const filePath = path.join(dir, 'sky.txt');
      fs.writeFileSync(filePath, 'The sky is blue. Water is wet.');

      try {
        await runCommand(['sky is blue', '--file', filePath, '--context-only', '--top-k', '1'], {
          ...mockContext,
          options: { verbose: false, json: true },
        });
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }

      expect(createChatRuntime).not.toHaveBeenCalled();
      const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0])) as {
        messages: Array<{ role: string; content: string }>;
        sources: string[];
      };
      expect(output.sources).toEqual(['D1-1']);
      expect(output.messages[1]).toEqual({
        role: 'user',
        content: augmentUserMessage(
          'sky is blue',
          'Uploaded Documents:\nRetrieved Document Context:\n[D1-1] (sim=0.577)\nThe sky is blue. Water is wet.'
        ),
      });
    });

    it('skips a generated web search', async () => {
      await runCommand(['Question', '--context-only', '--search']);

      expect(mockContext.warn).toHaveBeenCalledWith(
        '--context-only searches only with --search-query; skipping web search'
      );
      expect(logOutput[0]).toBe('[system]');
    });
  });
});
