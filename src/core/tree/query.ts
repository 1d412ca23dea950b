/**
 * Tree query engine.
 *
 * Evaluates restricted path expressions against a {@link SyntaxNode} tree:
 *
 * - `//Tag`  any descendant with that tag
 * - `/Tag`, `/*`  direct children
 * - `/..`  parent of the current match
 * - `[@token='v']`  literal text, `[@internalRole='v']`  role,
 *   `[@name='v']`  attribute value
 *
 * Paths can be written as text (`parsePath`) or built with the step
 * combinators (`descendant`, `child`, `parent`, `path`). Matches come back in
 * document order without duplicates. The engine knows nothing about settings.
 */
import { QuerySyntaxError, ErrorCodes } from '../../utils/errors.js';
import type { SyntaxNode } from './types.js';

export type Predicate =
  | { kind: 'token'; value: string }
  | { kind: 'role'; value: string }
  | { kind: 'attribute'; name: string; value: string };

export type Step =
  | { axis: 'child' | 'descendant'; test: string; predicates: readonly Predicate[] }
  | { axis: 'parent' };

export interface PathExpression {
  readonly steps: readonly Step[];
}

/** Node test matching any tag. */
export const ANY = '*';

/** Attribute name that addresses the node's literal text. */
const TOKEN_ATTRIBUTE = 'token';
/** Attribute name that addresses the node's role. */
const ROLE_ATTRIBUTE = 'internalRole';

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

export function hasToken(value: string): Predicate {
  return { kind: 'token', value };
}

export function hasRole(value: string): Predicate {
  return { kind: 'role', value };
}

export function hasAttribute(name: string, value: string): Predicate {
  if (name === TOKEN_ATTRIBUTE) return hasToken(value);
  if (name === ROLE_ATTRIBUTE) return hasRole(value);
  return { kind: 'attribute', name, value };
}

export function child(test: string, ...predicates: Predicate[]): Step {
  return { axis: 'child', test, predicates };
}

export function descendant(test: string, ...predicates: Predicate[]): Step {
  return { axis: 'descendant', test, predicates };
}

export function parent(): Step {
  return { axis: 'parent' };
}

export function path(...steps: Step[]): PathExpression {
  if (steps.length === 0) {
    throw new QuerySyntaxError(ErrorCodes.QUERY_SYNTAX, 'A path needs at least one step');
  }
  return { steps };
}

/**
 * Render a path back to its textual form.
 */
export function formatPath(expression: PathExpression): string {
  return expression.steps
    .map((step) => {
      if (step.axis === 'parent') return '/..';
      const axis = step.axis === 'descendant' ? '//' : '/';
      const predicates = step.predicates.map(formatPredicate).join('');
      return `${axis}${step.test}${predicates}`;
    })
    .join('');
}

function formatPredicate(predicate: Predicate): string {
  const name =
    predicate.kind === 'token' ? TOKEN_ATTRIBUTE
      : predicate.kind === 'role' ? ROLE_ATTRIBUTE
        : predicate.name;
  const quote = predicate.value.includes("'") ? '"' : "'";
  return `[@${name}=${quote}${predicate.value}${quote}]`;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const NAME_PATTERN = /[A-Za-z_][\w.-]*/y;

/**
 * Parse a textual path expression.
 *
 * @throws QuerySyntaxError when the expression is malformed
 */
export function parsePath(expression: string): PathExpression {
  const steps: Step[] = [];
  let pos = 0;

  const fail = (message: string): never => {
    throw new QuerySyntaxError(
      ErrorCodes.QUERY_SYNTAX,
      `${message} at position ${pos} in "${expression}"`,
      { expression, position: pos }
    );
  };

  const readName = (): string => {
    NAME_PATTERN.lastIndex = pos;
    const match = NAME_PATTERN.exec(expression);
    if (!match) return fail('Expected a name');
    pos += match[0].length;
    return match[0];
  };

  const skipSpaces = (): void => {
    while (expression[pos] === ' ') pos++;
  };

  const readQuoted = (): string => {
    const quote = expression[pos];
    if (quote !== "'" && quote !== '"') return fail('Expected a quoted value');
    const end = expression.indexOf(quote, pos + 1);
    if (end === -1) return fail('Unterminated string');
    const value = expression.slice(pos + 1, end);
    pos = end + 1;
    return value;
  };

  const readPredicate = (): Predicate => {
    pos++; // '['
    skipSpaces();
    if (expression[pos] !== '@') fail("Expected '@'");
    pos++;
    const name = readName();
    skipSpaces();
    if (expression[pos] !== '=') fail("Expected '='");
    pos++;
    skipSpaces();
    const value = readQuoted();
    skipSpaces();
    if (expression[pos] !== ']') fail("Expected ']'");
    pos++;
    return hasAttribute(name, value);
  };

  if (expression.trim() === '') fail('Empty path');

  while (pos < expression.length) {
    if (expression[pos] !== '/') fail("Expected '/'");
    const isDescendant = expression[pos + 1] === '/';
    pos += isDescendant ? 2 : 1;

    if (expression.startsWith('..', pos)) {
      if (isDescendant) fail("'..' cannot follow '//'");
      pos += 2;
      steps.push(parent());
      continue;
    }

    let test: string;
    if (expression[pos] === '*') {
      pos++;
      test = ANY;
    } else {
      test = readName();
    }

    const predicates: Predicate[] = [];
    while (expression[pos] === '[') {
      predicates.push(readPredicate());
    }

    steps.push(isDescendant ? descendant(test, ...predicates) : child(test, ...predicates));
  }

  return { steps };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Virtual context above the root; its only child is the root. */
const DOCUMENT: unique symbol = Symbol('document');
type Context = SyntaxNode | typeof DOCUMENT;

/**
 * Parent links and pre-order positions for one tree.
 */
class TreeIndex {
  private readonly parents = new Map<SyntaxNode, SyntaxNode>();
  private readonly order = new Map<SyntaxNode, number>();

  constructor(readonly root: SyntaxNode) {
    const stack: SyntaxNode[] = [root];
    let counter = 0;
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) break;
      this.order.set(node, counter++);
      for (let i = node.children.length - 1; i >= 0; i--) {
        const childNode = node.children[i];
        this.parents.set(childNode, node);
        stack.push(childNode);
      }
    }
  }

  parentOf(context: Context): Context | undefined {
    if (context === DOCUMENT) return undefined;
    if (context === this.root) return DOCUMENT;
    return this.parents.get(context);
  }

  orderOf(context: Context): number {
    if (context === DOCUMENT) return -1;
    return this.order.get(context) ?? Number.MAX_SAFE_INTEGER;
  }

  childrenOf(context: Context): readonly SyntaxNode[] {
    return context === DOCUMENT ? [this.root] : context.children;
  }

  /** Proper descendants of the context, in pre-order. */
  *descendantsOf(context: Context): Generator<SyntaxNode> {
    const stack = [...this.childrenOf(context)].reverse();
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined) return;
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }
}

const indexCache = new WeakMap<SyntaxNode, TreeIndex>();

function indexFor(root: SyntaxNode): TreeIndex {
  let index = indexCache.get(root);
  if (!index) {
    index = new TreeIndex(root);
    indexCache.set(root, index);
  }
  return index;
}

function resolvePath(query: PathExpression | string): PathExpression {
  return typeof query === 'string' ? parsePath(query) : query;
}

function satisfies(node: SyntaxNode, predicate: Predicate): boolean {
  switch (predicate.kind) {
    case 'token':
      return node.token === predicate.value;
    case 'role':
      return node.role === predicate.value;
    case 'attribute':
      return node.attributes[predicate.name] === predicate.value;
  }
}

function matchesTest(
  node: SyntaxNode,
  test: string,
  predicates: readonly Predicate[]
): boolean {
  if (test !== ANY && node.tag !== test) return false;
  return predicates.every((predicate) => satisfies(node, predicate));
}

function applyStep(index: TreeIndex, contexts: readonly Context[], step: Step): Context[] {
  const matched = new Set<Context>();

  for (const context of contexts) {
    if (step.axis === 'parent') {
      const up = index.parentOf(context);
      if (up !== undefined) matched.add(up);
      continue;
    }

    const candidates =
      step.axis === 'child' ? index.childrenOf(context) : index.descendantsOf(context);
    for (const node of candidates) {
      if (matchesTest(node, step.test, step.predicates)) matched.add(node);
    }
  }

  return [...matched].sort((a, b) => index.orderOf(a) - index.orderOf(b));
}

/**
 * Evaluate a path against a tree rooted at `root`.
 * A leading `//` also considers `root` itself.
 *
 * @returns matches in document order; empty when any step matches nothing
 */
export function select(root: SyntaxNode, query: PathExpression | string): SyntaxNode[] {
  const expression = resolvePath(query);
  const index = indexFor(root);

  let contexts: Context[] = [DOCUMENT];
  for (const step of expression.steps) {
    contexts = applyStep(index, contexts, step);
    if (contexts.length === 0) return [];
  }

  return contexts.filter((context): context is SyntaxNode => context !== DOCUMENT);
}

/**
 * First match of a path, or undefined when nothing matches.
 */
export function selectFirst(
  root: SyntaxNode,
  query: PathExpression | string
): SyntaxNode | undefined {
  return select(root, query)[0];
}
