import type Parser from 'tree-sitter';
import { parseAST } from '../ast/parser.js';
import { calculateComplexity, type DecisionPoints } from '../ast/complexity/cyclomatic.js';
import type { ComponentRecord, FileRecord, HandlerResult } from '../types.js';
import { parseFailure, type LanguageHandler } from './types.js';
import { isBinary, unique } from './patterns.js';

/**
 * Comprehension clauses and conditional expressions are not counted.
 */
const PYTHON_DECISION_POINTS: DecisionPoints = {
  nodeTypes: new Set([
    'if_statement',
    'elif_clause',
    'for_statement',
    'while_statement',
    'except_clause',
    'except_group_clause',
  ]),
  // `a and b and c` nests as two boolean_operator nodes
  booleanOperatorTypes: new Set(['boolean_operator']),
};

function spanLines(node: Parser.SyntaxNode): number {
  return node.endPosition.row - node.startPosition.row + 1;
}

/**
 * A function is a method when its nearest enclosing block belongs to a
 * class. Decorators wrap the definition and are skipped.
 */
function isMethod(node: Parser.SyntaxNode): boolean {
  let container = node.parent;
  if (container?.type === 'decorated_definition') {
    container = container.parent;
  }
  return container?.type === 'block' && container.parent?.type === 'class_definition';
}

function collectComponents(root: Parser.SyntaxNode): ComponentRecord[] {
  const components: ComponentRecord[] = [];
  const definitions = root.descendantsOfType(['function_definition', 'class_definition']);

  for (const node of definitions) {
    const name = node.childForFieldName('name')?.text;
    if (!name) continue;

    if (node.type === 'class_definition') {
      components.push({ name, kind: 'class', lines: spanLines(node) });
    } else {
      components.push({ name, kind: isMethod(node) ? 'method' : 'function', lines: spanLines(node) });
    }
  }

  return components;
}

/**
 * Module name of an import_from_statement or a `from __future__ import`. Purely relative imports
 * (`from . import x`) have no module and yield nothing.
 */
function fromModuleName(node: Parser.SyntaxNode): string | null {
  if (node.type === 'future_import_statement') return '__future__';
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return null;
  if (moduleNode.type === 'relative_import') {
    const dotted = moduleNode.namedChildren.find(child => child.type === 'dotted_name');
    return dotted ? dotted.text : null;
  }
  return moduleNode.text;
}

function collectDependencies(root: Parser.SyntaxNode): string[] {
  const modules: string[] = [];
  const statements = root.descendantsOfType([
    'import_statement',
    'import_from_statement',
    'future_import_statement',
  ]);

  for (const statement of statements) {
    if (statement.type !== 'import_statement') {
      const name = fromModuleName(statement);
      if (name) modules.push(name);
      continue;
    }

    for (const child of statement.namedChildren) {
      if (child.type === 'dotted_name') {
        modules.push(child.text);
      } else if (child.type === 'aliased_import') {
        const name = child.childForFieldName('name')?.text;
        if (name) modules.push(name);
      }
    }
  }

  return unique(modules);
}

/**
 * Python handler backed by the tree-sitter grammar. Any syntax error in
 * the file counts as a parse failure.
 */
export class PythonHandler implements LanguageHandler {
  readonly id = 'python';

  private parse(content: string): Parser.SyntaxNode | null {
    if (isBinary(content)) return null;
    const { tree, error } = parseAST(content, 'python');
    if (!tree || error) return null;
    return tree.rootNode;
  }

  analyze(file: FileRecord): HandlerResult {
    const root = this.parse(file.content);
    if (!root) return parseFailure();

    return {
      components: collectComponents(root),
      dependencies: collectDependencies(root),
      complexity: calculateComplexity(root, PYTHON_DECISION_POINTS),
    };
  }

  extractComponents(content: string): ComponentRecord[] {
    const root = this.parse(content);
    return root ? collectComponents(root) : [];
  }

  extractDependencies(content: string): string[] {
    const root = this.parse(content);
    return root ? collectDependencies(root) : [];
  }

  estimateComplexity(content: string): number {
    const root = this.parse(content);
    return root ? calculateComplexity(root, PYTHON_DECISION_POINTS) : 0;
  }
}
