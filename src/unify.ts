import {
  Clause,
  equal,
  getFreeVars,
  isVariable,
  Node,
  NodeKind,
  Predicate,
  render,
  Term,
  transform,
  TransformFns,
} from './ast';
import { extractPredicates } from './clauses';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Represents a mapping from variable names to terms. Bindings are kept in
 * the order they were made and are applied in that order.
 */
export type Substitution = Map<string, Term>;

/**
 * Why two terms or predicates failed to unify:
 * - conflict: two different non-variable terms
 * - arity: same name used with different numbers of arguments
 * - occurs: a variable would have to contain itself
 * - name: the predicates have different names
 */
export type NoUnifierReason = 'conflict' | 'arity' | 'occurs' | 'name';

/**
 * Represents the (expected) outcome that two clauses have no unifier.
 */
export class NoUnifierError extends Error {
  constructor(
    public readonly reason: NoUnifierReason,
    public readonly left: Term | Predicate,
    public readonly right: Term | Predicate
  ) {
    super(`no unifier (${reason}): ${render(left)} and ${render(right)}`);
    this.name = 'NoUnifierError';
  }
}

type Pair = [Term, Term];

/**
 * Replaces the free occurrences of a variable.
 */
function substitute(f: Node, name: string, term: Term): Node {
  const cbs: TransformFns = {
    Ident: (t) => (t.name == name ? term : t),
    ForAll: (f) =>
      f.vars.includes(name) ? f : { ...f, arg: transform(f.arg, cbs) },
    ThereExists: (f) =>
      f.vars.includes(name) ? f : { ...f, arg: transform(f.arg, cbs) },
  };

  return transform(f, cbs);
}

/**
 * Applies a substitution to the free variables in a term or clause.
 */
export function apply(sub: Substitution, f: Term): Term;
export function apply(sub: Substitution, f: Predicate): Predicate;
export function apply(sub: Substitution, f: Clause): Clause;
export function apply(sub: Substitution, f: Node): Node {
  let res = f;
  for (const [name, term] of sub) res = substitute(res, name, term);
  return res;
}

function disagreements(p: Predicate, q: Predicate): Pair[] {
  if (p.args.length != q.args.length) {
    throw new NoUnifierError('arity', p, q);
  }
  return p.args.map((arg, i): Pair => [arg, q.args[i]]);
}

/**
 * Resolves a disagreement list into a substitution, Robinson style. Pairs are
 * processed in insertion order; binding a variable rewrites every remaining
 * pair, including the arguments of skolem witnesses.
 */
function solve(pairs: Pair[]): Substitution {
  const sub: Substitution = new Map();

  const bind = (name: string, term: Term, left: Term, right: Term) => {
    if (getFreeVars(term).includes(name)) {
      throw new NoUnifierError('occurs', left, right);
    }
    const single: Substitution = new Map([[name, term]]);
    for (let i = 0; i < pairs.length; i++) {
      const [a, b] = pairs[i];
      pairs[i] = [apply(single, a), apply(single, b)];
    }
    sub.set(name, term);
    debugLogger.trace(LogComponent.UNIFY, `bound ${name} to ${render(term)}`);
  };

  let pair: Pair | undefined;
  while ((pair = pairs.shift()) !== undefined) {
    const [a, b] = pair;

    if (equal(a, b)) continue;

    if (a.kind == NodeKind.Ident && isVariable(a)) {
      bind(a.name, b, a, b);
    } else if (b.kind == NodeKind.Ident && isVariable(b)) {
      bind(b.name, a, a, b);
    } else if (
      a.kind == NodeKind.Skolem &&
      b.kind == NodeKind.Skolem &&
      a.id == b.id &&
      a.args.length == b.args.length
    ) {
      const other = b.args;
      pairs.push(...a.args.map((arg, i): Pair => [arg, other[i]]));
    } else {
      throw new NoUnifierError('conflict', a, b);
    }
  }

  return sub;
}

/**
 * Returns the substitution unifying every pair of same-named predicates
 * across the two clauses: each predicate of `x` is paired with each predicate
 * of `y` sharing its name, and all of their arguments have to agree at once.
 * Throws `NoUnifierError` if there is no such substitution.
 */
export function unify(x: Clause, y: Clause): Substitution {
  const pairs: Pair[] = [];
  const right = extractPredicates(y);
  for (const p of extractPredicates(x)) {
    for (const q of right) {
      if (p.name == q.name) pairs.push(...disagreements(p, q));
    }
  }

  debugLogger.debug(
    LogComponent.UNIFY,
    `unifying ${render(x)} with ${render(y)} over ${pairs.length} disagreements`
  );
  return solve(pairs);
}

/**
 * Returns the most general unifier of a single pair of predicates, which is
 * the primitive a resolution step needs.
 */
export function unifyPredicates(p: Predicate, q: Predicate): Substitution {
  if (p.name != q.name) throw new NoUnifierError('name', p, q);
  return solve(disagreements(p, q));
}
