import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { MIN_PARSE_BUFFER_SIZE } from '../constants.js';

/**
 * Languages that have a tree-sitter grammar installed.
 * Everything else is handled by pattern extraction.
 */
export type GrammarLanguage = 'python';

export interface ASTParseResult {
  tree: Parser.Tree | null;
  error?: string;
}

const grammars = {
  python: Python,
} satisfies Record<GrammarLanguage, unknown>;

/**
 * Cache for parser instances to avoid recreating them
 */
const parserCache = new Map<GrammarLanguage, Parser>();

/**
 * Get or create a cached parser instance for a language
 */
function getParser(language: GrammarLanguage): Parser {
  const cached = parserCache.get(language);
  if (cached) return cached;

  const parser = new Parser();
  parser.setLanguage(grammars[language]);
  parserCache.set(language, parser);
  return parser;
}

/**
 * Parse source code into an AST using Tree-sitter.
 *
 * A tree whose root reports `hasError` is returned together with an error
 * message; callers decide whether a partial tree is usable.
 */
export function parseAST(content: string, language: GrammarLanguage): ASTParseResult {
  try {
    const parser = getParser(language);
    const bufferSize = Math.max(MIN_PARSE_BUFFER_SIZE, content.length * 2);
    const tree = parser.parse(content, undefined, { bufferSize });

    // hasError is a property, not a method
    if (tree.rootNode.hasError) {
      return {
        tree,
        error: 'Parse completed with errors',
      };
    }

    return { tree };
  } catch (error) {
    return {
      tree: null,
      error: error instanceof Error ? error.message : 'Unknown parse error',
    };
  }
}

/**
 * Clear parser cache (useful for testing)
 */
export function clearParserCache(): void {
  parserCache.clear();
}
