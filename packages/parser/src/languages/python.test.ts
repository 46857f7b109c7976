import { describe, it, expect } from 'vitest';
import { PythonHandler } from './python.js';
import type { FileRecord } from '../types.js';

function pythonFile(content: string): FileRecord {
  return {
    path: 'app/module.py',
    name: 'module.py',
    language: 'Python',
    content,
    lines: content.split('\n').length,
  };
}

describe('PythonHandler', () => {
  const handler = new PythonHandler();

  it('counts a single if on top of the baseline', () => {
    const content = `def check(x):
    if x > 0:
        return 1
    return 0
`;
    const result = handler.analyze(pythonFile(content));

    expect(result.complexity).toBe(2);
    expect(result.components).toEqual([{ name: 'check', kind: 'function', lines: 4 }]);
    expect(result.dependencies).toEqual([]);
  });

  it('counts branches, loops, handlers and boolean chains', () => {
    const content = `def grade(a, b, c):
    if a and b and c:
        return 1
    elif a or b:
        return 2
    for i in range(3):
        while i:
            i -= 1
    try:
        pass
    except ValueError:
        pass
    return 0
`;
    // if, elif, for, while, except + two for the and-chain + one for or
    expect(handler.estimateComplexity(content)).toBe(9);
  });

  it('counts exception group handlers', () => {
    const content = `try:
    run()
except* OSError:
    pass
`;
    expect(handler.estimateComplexity(content)).toBe(2);
  });

  it('records future imports as a dependency', () => {
    const content = `from __future__ import annotations
import os
`;
    expect(handler.extractDependencies(content)).toEqual(['__future__', 'os']);
  });

  it('does not count conditional expressions or comprehensions', () => {
    const content = `x = 1 if ready else 2
squares = [n * n for n in range(10) if n]
`;
    expect(handler.estimateComplexity(content)).toBe(1);
  });

  it('reports methods inside classes, including decorated ones', () => {
    const content = `class Service:
    @staticmethod
    def build():
        return Service()

    def run(self):
        pass

def helper():
    pass
`;
    const components = handler.extractComponents(content);

    expect(components.map(c => [c.name, c.kind])).toEqual([
      ['Service', 'class'],
      ['build', 'method'],
      ['run', 'method'],
      ['helper', 'function'],
    ]);
  });

  it('extracts imports once each and skips module-less relative imports', () => {
    const content = `import os
import numpy as np
from collections import OrderedDict
from .models import User
from . import utils
import os.path
import os
`;
    expect(handler.extractDependencies(content)).toEqual([
      'os',
      'numpy',
      'collections',
      'models',
      'os.path',
    ]);
  });

  it('returns empty facts and complexity 0 for a syntax error', () => {
    const result = handler.analyze(pythonFile('def broken(:\n    pass\n'));

    expect(result).toEqual({ components: [], dependencies: [], complexity: 0 });
  });

  it('treats binary content as a parse failure', () => {
    const result = handler.analyze(pythonFile('\u0000\u0001\u0002'));

    expect(result.complexity).toBe(0);
  });

  it('gives an empty module the baseline complexity', () => {
    expect(handler.estimateComplexity('')).toBe(1);
  });
});
