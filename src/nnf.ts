import {
  Clause,
  NodeKind,
  render,
  transform,
  TransformFns,
  UnsupportedClauseKindError,
} from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * Returns the negation of a clause with the negation pushed inwards one
 * connective at a time (De Morgan, quantifier duality, double negation).
 * Given a clause in negation normal form the result is in negation normal
 * form too.
 */
export function negate(f: Clause): Clause {
  switch (f.kind) {
    case NodeKind.Predicate:
      return { kind: NodeKind.Not, arg: f };
    case NodeKind.Not:
      // ¬¬A → A
      return f.arg;
    case NodeKind.And:
      // ¬(A ∧ B) → (¬A ∨ ¬B)
      return { kind: NodeKind.Or, left: negate(f.left), right: negate(f.right) };
    case NodeKind.Or:
      // ¬(A ∨ B) → (¬A ∧ ¬B)
      return { kind: NodeKind.And, left: negate(f.left), right: negate(f.right) };
    case NodeKind.ForAll:
      // ¬(∀x A) → (∃x ¬A)
      return { kind: NodeKind.ThereExists, vars: f.vars, arg: negate(f.arg) };
    case NodeKind.ThereExists:
      // ¬(∃x A) → (∀x ¬A)
      return { kind: NodeKind.ForAll, vars: f.vars, arg: negate(f.arg) };
    case NodeKind.Implies:
      // ¬(A → B) → (A ∧ ¬B), only sound at the top of the implication
      return { kind: NodeKind.And, left: f.left, right: negate(f.right) };
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'negate');
    }
  }
}

/**
 * Converts all instances of A→B to ¬A∨B, with the negation of A pushed
 * inwards by `negate`. Both sides are converted first.
 */
export function eliminateImplication(f: Clause): Clause {
  const cbs: TransformFns = {
    Implies: (f) => ({
      kind: NodeKind.Or,
      left: negate(transform(f.left, cbs)),
      right: transform(f.right, cbs),
    }),
  };

  return transform(f, cbs);
}

/**
 * Pushes all negations down to predicates. Works bottom-up, so every clause
 * handed to `negate` is already in negation normal form. Implications must
 * have been eliminated first.
 */
export function pushNegationsDown(f: Clause): Clause {
  const cbs: TransformFns = {
    Not: (f) => negate(transform(f.arg, cbs)),
    Implies: (f) => {
      throw new UnsupportedClauseKindError(f, 'pushNegationsDown');
    },
  };

  return transform(f, cbs);
}

/**
 * Converts a clause to negation normal form.
 */
export function toNNF(f: Clause): Clause {
  const res = pushNegationsDown(eliminateImplication(f));
  debugLogger.logClause(LogComponent.NNF, LogLevel.DEBUG, 'nnf', () =>
    render(res)
  );
  return res;
}

/**
 * Returns true if the clause has no implications and only negates
 * predicates.
 */
export function isNNF(f: Clause): boolean {
  switch (f.kind) {
    case NodeKind.Predicate:
      return true;
    case NodeKind.Not:
      return f.arg.kind === NodeKind.Predicate;
    case NodeKind.And:
    case NodeKind.Or:
      return isNNF(f.left) && isNNF(f.right);
    case NodeKind.Implies:
      return false;
    case NodeKind.ForAll:
    case NodeKind.ThereExists:
      return isNNF(f.arg);
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'isNNF');
    }
  }
}
