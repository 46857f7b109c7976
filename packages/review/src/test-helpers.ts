/**
 * Factories for tests: file records, analyses and an LLM client that
 * never touches the network.
 */

import type { FileAnalysis, FileRecord } from '@relgate/parser';
import type { LLMClient, LLMOptions, LLMResponse, LLMUsage } from './llm-client.js';

export function createTestFile(overrides?: Partial<FileRecord>): FileRecord {
  const content = overrides?.content ?? 'def main():\n    return 0\n';
  const path = overrides?.path ?? 'src/main.py';
  return {
    path,
    name: path.split('/').pop() ?? path,
    language: 'Python',
    content,
    lines: content.split('\n').length,
    ...overrides,
  };
}

export function createTestAnalysis(overrides?: Partial<FileAnalysis>): FileAnalysis {
  return {
    path: 'src/main.py',
    name: 'main.py',
    language: 'Python',
    lines: 10,
    handler: 'python',
    status: 'ok',
    components: [],
    dependencies: [],
    complexity: 1,
    ...overrides,
  };
}

/**
 * Create a mock LLM client that returns predefined responses.
 *
 * @param responses - Queue of responses to return. An Error in the queue is thrown instead.
 */
export function createMockLLMClient(
  responses: Array<string | Error> = [],
): LLMClient & { calls: Array<{ prompt: string; opts?: LLMOptions }> } {
  const queue = [...responses];
  const calls: Array<{ prompt: string; opts?: LLMOptions }> = [];
  const usage: LLMUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0, cost: 0 };

  return {
    calls,
    async complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse> {
      calls.push({ prompt, opts });

      const next = queue.shift();
      if (next instanceof Error) {
        throw next;
      }

      usage.promptTokens += 100;
      usage.completionTokens += 50;
      usage.totalTokens += 150;
      return { content: next ?? 'No comment.' };
    },
    getUsage() {
      return { ...usage };
    },
  };
}
