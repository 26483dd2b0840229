import {
  Clause,
  NodeKind,
  Predicate,
  render,
  UnsupportedClauseKindError,
} from './ast';

/**
 * Returns the predicates of a clause, left to right and depth first. Only
 * flattens; connectives and negations are discarded.
 */
export function extractPredicates(f: Clause): Predicate[] {
  switch (f.kind) {
    case NodeKind.Predicate:
      return [f];
    case NodeKind.And:
    case NodeKind.Or:
    case NodeKind.Implies:
      return [...extractPredicates(f.left), ...extractPredicates(f.right)];
    case NodeKind.Not:
    case NodeKind.ForAll:
    case NodeKind.ThereExists:
      return extractPredicates(f.arg);
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'extractPredicates');
    }
  }
}

/**
 * A predicate or its negation.
 */
export type Literal = {
  predicate: Predicate;
  negated: boolean;
};

/**
 * A disjunction of literals.
 */
export type CNFClause = Literal[];

/**
 * Splits a clause in CNF into its disjunctions. A leading prefix of universal
 * quantifiers is dropped.
 */
export function cnfToClauses(f: Clause): CNFClause[] {
  while (f.kind === NodeKind.ForAll) f = f.arg;

  const conjuncts: Clause[] = [];
  const splitAnd = (f: Clause): void => {
    if (f.kind == NodeKind.And) {
      splitAnd(f.left);
      splitAnd(f.right);
    } else {
      conjuncts.push(f);
    }
  };
  splitAnd(f);

  return conjuncts.map((f) => {
    const literals: Literal[] = [];
    const splitOr = (f: Clause): void => {
      if (f.kind == NodeKind.Or) {
        splitOr(f.left);
        splitOr(f.right);
      } else if (f.kind == NodeKind.Predicate) {
        literals.push({ predicate: f, negated: false });
      } else if (f.kind == NodeKind.Not && f.arg.kind == NodeKind.Predicate) {
        literals.push({ predicate: f.arg, negated: true });
      } else {
        throw new UnsupportedClauseKindError(f, 'cnfToClauses');
      }
    };
    splitOr(f);
    return literals;
  });
}

/**
 * Renders a clause as its literals separated by `|`.
 */
export function renderClause(clause: CNFClause): string {
  return clause
    .map((lit) =>
      lit.negated
        ? render({ kind: NodeKind.Not, arg: lit.predicate })
        : render(lit.predicate)
    )
    .join(' | ');
}
