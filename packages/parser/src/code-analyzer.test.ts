import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@relgate/core';
import { CodeAnalyzer, summarize } from './code-analyzer.js';
import { LanguageRegistry, createDefaultRegistry } from './languages/registry.js';
import type { LanguageHandler } from './languages/types.js';
import type { FileAnalysis, FileRecord } from './types.js';

function makeFile(path: string, language: string, content: string): FileRecord {
  return {
    path,
    name: path.split('/').pop() ?? path,
    language,
    content,
    lines: content.split('\n').length,
  };
}

function mockLogger(): Logger {
  return {
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const PYTHON_CHECK = `import os

def check(x):
    if x > 0:
        return 1
    return 0
`;

const JS_BRANCHES = `import { join } from 'path';
function pick(x) {
  if (x) { return 1; }
  if (!x) { return 2; }
}
`;

describe('CodeAnalyzer', () => {
  const batch: FileRecord[] = [
    makeFile('src/check.py', 'Python', PYTHON_CHECK),
    makeFile('src/broken.py', 'Python', 'def broken(:\n    pass\n'),
    makeFile('src/tool.rb', 'Ruby', 'def run\nend\n'),
    makeFile('src/pick.js', 'JavaScript', JS_BRANCHES),
  ];

  it('analyzes each file with its handler and keeps input order', async () => {
    const analyzer = new CodeAnalyzer(createDefaultRegistry(), { concurrency: 2 });
    const { files, complete, skipped } = await analyzer.analyze(batch);

    expect(complete).toBe(true);
    expect(skipped).toEqual([]);
    expect(files.map(f => [f.path, f.handler, f.status, f.complexity])).toEqual([
      ['src/check.py', 'python', 'ok', 2],
      ['src/broken.py', 'python', 'parse-error', 0],
      ['src/tool.rb', 'fallback', 'not-estimated', null],
      ['src/pick.js', 'javascript', 'ok', 3],
    ]);
  });

  it('excludes parse failures and fallback files from complexity aggregates', async () => {
    const analyzer = new CodeAnalyzer(createDefaultRegistry());
    const { summary } = await analyzer.analyze(batch);

    expect(summary.complexity).toEqual({ average: 2.5, max: 3, samples: 2 });
    expect(summary.languages).toEqual({ Python: 2, Ruby: 1, JavaScript: 1 });
    expect(summary.dependencies).toEqual(['os', 'path']);
    expect(summary.components.map(c => c.name)).toEqual(['check', 'run', 'pick']);
  });

  it('caps visible components and dependencies but reports true totals', async () => {
    const analyzer = new CodeAnalyzer(createDefaultRegistry(), {
      maxComponents: 2,
      maxDependencies: 1,
    });
    const { summary } = await analyzer.analyze(batch);

    expect(summary.components).toHaveLength(2);
    expect(summary.totalComponents).toBe(3);
    expect(summary.dependencies).toEqual(['os']);
    expect(summary.totalDependencies).toBe(2);
  });

  it('applies the fallback component limit', async () => {
    const content = Array.from({ length: 5 }, (_, i) => `def step${i}`).join('\n');
    const analyzer = new CodeAnalyzer(createDefaultRegistry(), { fallbackComponentLimit: 3 });

    const result = analyzer.analyzeFile(makeFile('x.rb', 'Ruby', content));

    expect(result.components.map(c => c.name)).toEqual(['step0', 'step1', 'step2']);
  });

  it('isolates a throwing handler and keeps the batch going', async () => {
    const exploding: LanguageHandler = {
      id: 'exploding',
      analyze: () => {
        throw new Error('boom');
      },
      extractComponents: () => [],
      extractDependencies: () => [],
      estimateComplexity: () => 0,
    };
    const registry = createDefaultRegistry().register('Python', exploding);
    const logger = mockLogger();
    const analyzer = new CodeAnalyzer(registry, { logger });

    const { files, complete } = await analyzer.analyze([
      makeFile('a.py', 'Python', PYTHON_CHECK),
      makeFile('b.js', 'JavaScript', JS_BRANCHES),
    ]);

    expect(complete).toBe(true);
    expect(files[0]).toMatchObject({
      path: 'a.py',
      handler: 'exploding',
      status: 'failed',
      complexity: 0,
      components: [],
      error: 'boom',
    });
    expect(files[1].status).toBe('ok');
    expect(logger.error).toHaveBeenCalledWith('Analysis failed for a.py: boom');
  });

  it('logs a warning for files that fail to parse', async () => {
    const logger = mockLogger();
    const analyzer = new CodeAnalyzer(createDefaultRegistry(), { logger });

    analyzer.analyzeFile(makeFile('src/broken.py', 'Python', 'def broken(:\n'));

    expect(logger.warning).toHaveBeenCalledWith('Could not parse src/broken.py as Python');
  });

  it('returns an incomplete result when aborted before work starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const analyzer = new CodeAnalyzer(createDefaultRegistry());

    const result = await analyzer.analyze(batch, { signal: controller.signal });

    expect(result.complete).toBe(false);
    expect(result.files).toEqual([]);
    expect(result.skipped).toEqual(batch.map(f => f.path));
    expect(result.summary.complexity.samples).toBe(0);
  });

  it('produces the same analysis on repeated runs', async () => {
    const analyzer = new CodeAnalyzer(createDefaultRegistry(), { concurrency: 3 });

    const first = await analyzer.analyze(batch);
    const second = await analyzer.analyze(batch);

    expect(second).toEqual(first);
  });

  it('works with an empty registry', async () => {
    const analyzer = new CodeAnalyzer(new LanguageRegistry());
    const { files } = await analyzer.analyze([makeFile('a.py', 'Python', 'def a(): pass')]);

    expect(files[0].status).toBe('not-estimated');
    expect(files[0].components).toEqual([{ name: 'a', kind: 'function', lines: 0 }]);
  });
});

describe('summarize', () => {
  function analysis(overrides: Partial<FileAnalysis>): FileAnalysis {
    return {
      path: 'f',
      name: 'f',
      language: 'Go',
      lines: 1,
      handler: 'go',
      status: 'ok',
      components: [],
      dependencies: [],
      complexity: 1,
      ...overrides,
    };
  }

  it('rounds the average to two decimals', () => {
    const summary = summarize([
      analysis({ complexity: 1 }),
      analysis({ complexity: 2 }),
      analysis({ complexity: 2 }),
    ]);

    expect(summary.complexity.average).toBe(1.67);
    expect(summary.complexity.max).toBe(2);
  });

  it('reports zeros when no file has a complexity sample', () => {
    const summary = summarize([analysis({ complexity: 0 }), analysis({ complexity: null })]);

    expect(summary.complexity).toEqual({ average: 0, max: 0, samples: 0 });
  });

  it('deduplicates dependencies across files in first-seen order', () => {
    const summary = summarize([
      analysis({ dependencies: ['fmt', 'os'] }),
      analysis({ dependencies: ['os', 'net/http'] }),
    ]);

    expect(summary.dependencies).toEqual(['fmt', 'os', 'net/http']);
  });
});
