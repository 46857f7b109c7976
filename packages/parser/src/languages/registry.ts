import type { LanguageHandler } from './types.js';
import { PythonHandler } from './python.js';
import { JavaScriptHandler } from './javascript.js';
import { JavaHandler } from './java.js';
import { CppHandler } from './cpp.js';
import { GoHandler } from './go.js';

/**
 * Maps declared language labels to handlers.
 *
 * Lookup of an unknown label returns undefined; callers fall back to
 * generic extraction rather than treating it as an error.
 */
export class LanguageRegistry {
  private readonly handlers = new Map<string, LanguageHandler>();

  /** Register a handler for a label. A second call for the same label replaces the first. */
  register(label: string, handler: LanguageHandler): this {
    this.handlers.set(label, handler);
    return this;
  }

  get(label: string): LanguageHandler | undefined {
    return this.handlers.get(label);
  }

  has(label: string): boolean {
    return this.handlers.has(label);
  }

  /** Registered labels in registration order */
  languages(): string[] {
    return [...this.handlers.keys()];
  }
}

/**
 * Build a registry with every built-in handler. Each call returns a fresh
 * instance, so runs never share registration state.
 */
export function createDefaultRegistry(): LanguageRegistry {
  const javascript = new JavaScriptHandler();

  return new LanguageRegistry()
    .register('Python', new PythonHandler())
    .register('JavaScript', javascript)
    .register('TypeScript', javascript)
    .register('Java', new JavaHandler())
    .register('C', new CppHandler('c'))
    .register('C++', new CppHandler('cpp'))
    .register('Go', new GoHandler());
}
