import type Parser from 'tree-sitter';

/**
 * Decision points for a syntax-walk complexity count.
 *
 * `nodeTypes` add one each. `booleanOperatorTypes` are binary nodes whose
 * operands are short-circuit conditions; a chain of N operands parses as
 * N-1 nested nodes, so counting each node adds N-1 for the chain.
 */
export interface DecisionPoints {
  nodeTypes: ReadonlySet<string>;
  booleanOperatorTypes: ReadonlySet<string>;
}

/**
 * Calculate cyclomatic complexity of a subtree.
 *
 * Complexity = 1 (base) + number of decision points
 *
 * @param node - AST node to analyze (a whole module or a single function)
 * @returns Cyclomatic complexity score (minimum 1)
 */
export function calculateComplexity(node: Parser.SyntaxNode, points: DecisionPoints): number {
  let complexity = 1; // Base complexity

  // Iterative walk; deeply nested modules would overflow a recursive one
  const stack: Parser.SyntaxNode[] = [node];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;

    if (points.nodeTypes.has(n.type) || points.booleanOperatorTypes.has(n.type)) {
      complexity++;
    }

    for (let i = 0; i < n.namedChildCount; i++) {
      const child = n.namedChild(i);
      if (child) stack.push(child);
    }
  }

  return complexity;
}
