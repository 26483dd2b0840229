import {
  And,
  Clause,
  NodeKind,
  render,
  transform,
  TransformFns,
  UnsupportedClauseKindError,
} from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';
import { toNNF } from './nnf';
import { skolemize, SkolemAllocator } from './skolem';

export interface DistributeConfig {
  /**
   * Source of randomness for choosing which conjunction to expand when both
   * sides of a disjunction are conjunctions. The left one is expanded when
   * this returns a value below 0.5. Defaults to `Math.random`.
   */
  random?: () => number;
}

export interface CNFConfig extends DistributeConfig {
  /**
   * Allocator for skolem witnesses. Defaults to a new allocator starting at 0.
   */
  allocator?: SkolemAllocator;
}

/**
 * Distributes OR over AND, bottom-up. Quantifiers are recursed into but an
 * AND below a quantifier is never lifted past it.
 */
export function distributeOr(f: Clause, cfg?: DistributeConfig): Clause {
  const random = cfg?.random ?? Math.random;

  // (B ∧ C) ∨ A → (B ∨ A) ∧ (C ∨ A)
  const expand = (conj: And, other: Clause): Clause => ({
    kind: NodeKind.And,
    left: distribute({ kind: NodeKind.Or, left: conj.left, right: other }),
    right: distribute({ kind: NodeKind.Or, left: conj.right, right: other }),
  });

  const cbs: TransformFns = {
    Or: (f) => {
      const left = distribute(f.left);
      const right = distribute(f.right);

      if (left.kind === NodeKind.And && right.kind === NodeKind.And) {
        const pickLeft = random() < 0.5;
        debugLogger.trace(
          LogComponent.DISTRIBUTE,
          `both sides are conjunctions, expanding the ${pickLeft ? 'left' : 'right'} one`
        );
        return pickLeft ? expand(left, right) : expand(right, left);
      }
      if (left.kind === NodeKind.And) return expand(left, right);
      if (right.kind === NodeKind.And) return expand(right, left);
      return { kind: NodeKind.Or, left, right };
    },
    Implies: (f) => {
      throw new UnsupportedClauseKindError(f, 'distributeOr');
    },
  };

  const distribute = (f: Clause): Clause => transform(f, cbs);
  return distribute(f);
}

/**
 * Removes every universal quantifier. After negation normal form and
 * skolemization, with uniquely named bound variables, every remaining
 * variable is universally quantified so the quantifiers can stay implicit.
 */
export function dropUniversals(f: Clause): Clause {
  const cbs: TransformFns = {
    ForAll: (f) => transform(f.arg, cbs),
  };

  return transform(f, cbs);
}

/**
 * Returns true if the clause is a disjunction of literals.
 */
export function isMonolithicOr(f: Clause): boolean {
  switch (f.kind) {
    case NodeKind.Or:
      return isMonolithicOr(f.left) && isMonolithicOr(f.right);
    case NodeKind.Not:
      return f.arg.kind === NodeKind.Predicate;
    case NodeKind.Predicate:
      return true;
    default:
      return false;
  }
}

/**
 * Returns true if the clause is a conjunction of disjunctions of literals,
 * optionally under a prefix of universal quantifiers.
 */
export function isCNF(f: Clause): boolean {
  while (f.kind === NodeKind.ForAll) f = f.arg;

  const isConjunction = (f: Clause): boolean =>
    f.kind === NodeKind.And
      ? isConjunction(f.left) && isConjunction(f.right)
      : isMonolithicOr(f);

  return isConjunction(f);
}

/**
 * A named rewrite step of the normalization pipeline.
 */
export type Stage = {
  name: string;
  run: (f: Clause) => Clause;
};

/**
 * Runs the stages in order, feeding each stage the previous stage's output.
 */
export function runPipeline(f: Clause, stages: readonly Stage[]): Clause {
  return stages.reduce((g, stage) => {
    const res = stage.run(g);
    debugLogger.logClause(LogComponent.CNF, LogLevel.DEBUG, stage.name, () =>
      render(res)
    );
    return res;
  }, f);
}

/**
 * The stages `toCNF` runs: negation normal form first, then skolemization,
 * then distribution.
 */
export function cnfStages(cfg?: CNFConfig): Stage[] {
  const allocator = cfg?.allocator ?? new SkolemAllocator();
  return [
    { name: 'nnf', run: toNNF },
    { name: 'skolemize', run: (f) => skolemize(f, allocator) },
    { name: 'dropUniversals', run: dropUniversals },
    { name: 'distributeOr', run: (f) => distributeOr(f, cfg) },
  ];
}

/**
 * Converts a first-order clause to an equisatisfiable quantifier-free CNF
 * form suitable for use in a resolution-based refutation algorithm.
 */
export function toCNF(f: Clause, cfg?: CNFConfig): Clause {
  debugLogger.logClause(LogComponent.CNF, LogLevel.INFO, 'input', () =>
    render(f)
  );
  return runPipeline(f, cnfStages(cfg));
}
