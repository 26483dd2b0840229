import { expect } from 'chai';
import {
  and,
  equal,
  forAll,
  ident,
  or,
  predicate,
  render,
  type Clause,
  type Term,
} from './ast';
import { extractPredicates } from './clauses';
import { SkolemAllocator } from './skolem';
import {
  apply,
  NoUnifierError,
  Substitution,
  unify,
  unifyPredicates,
} from './unify';

const P = (...args: (Term | string)[]) => predicate('P', ...args);
const Q = (...args: string[]) => predicate('Q', ...args);

const bindings = (sub: Substitution): [string, string][] =>
  [...sub].map(([name, term]) => [name, render(term)]);

// Checks that the substitution makes every same-named pair of predicates
// across the two clauses identical.
function verifyUnification(x: Clause, y: Clause, sub: Substitution): boolean {
  for (const p of extractPredicates(x)) {
    for (const q of extractPredicates(y)) {
      if (p.name != q.name) continue;
      if (!equal(apply(sub, p), apply(sub, q))) return false;
    }
  }
  return true;
}

function attempt(x: Clause, y: Clause): Substitution | undefined {
  try {
    return unify(x, y);
  } catch (err) {
    if (err instanceof NoUnifierError) return undefined;
    throw err;
  }
}

describe('unify.ts', () => {
  describe('substitution application', () => {
    it('should apply bindings in order', () => {
      const sub: Substitution = new Map([
        ['X', ident('Y')],
        ['Y', ident('a')],
      ]);
      expect(render(apply(sub, P('X', 'Y', 'Z')))).to.equal('P(a, a, Z)');
    });

    it('should not substitute bound variables', () => {
      const sub: Substitution = new Map([['X', ident('a')]]);
      const f = and(P('X'), forAll(['X'], Q('X')));
      expect(render(apply(sub, f))).to.equal('(P(a) and (for_all (X) Q(X)))');
    });

    it('should substitute inside skolem witnesses', () => {
      const witness = new SkolemAllocator().fresh(['X', 'Y']);
      const sub: Substitution = new Map([['Y', ident('b')]]);
      expect(render(apply(sub, witness))).to.equal('F_0(X, b)');
      expect(render(witness)).to.equal('F_0(X, Y)');
    });
  });

  describe('basic unification patterns', () => {
    it('should bind variables to constants', () => {
      const sub = unify(P('X', 'Y'), P('a', 'b'));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'a'],
        ['Y', 'b'],
      ]);
    });

    it('should fail on distinct constants', () => {
      expect(() => unify(P('a'), P('b')))
        .to.throw(NoUnifierError, 'no unifier (conflict): a and b')
        .with.property('reason', 'conflict');
    });

    it('should bind variables on either side', () => {
      const sub = unify(P('a', 'Y'), P('X', 'b'));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'a'],
        ['Y', 'b'],
      ]);
    });

    it('should bind a variable to a variable', () => {
      expect(bindings(unify(P('X'), P('Y')))).to.deep.equal([['X', 'Y']]);
    });

    it('should skip pairs that already agree', () => {
      expect(unify(P('X', 'a'), P('X', 'a')).size).to.equal(0);
      expect(bindings(unify(P('a', 'X'), P('a', 'b')))).to.deep.equal([
        ['X', 'b'],
      ]);
    });

    it('should propagate bindings into the remaining pairs', () => {
      const sub = unify(P('X', 'X'), P('Y', 'a'));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'Y'],
        ['Y', 'a'],
      ]);
      expect(render(apply(sub, P('X', 'X')))).to.equal('P(a, a)');
      expect(render(apply(sub, P('Y', 'a')))).to.equal('P(a, a)');
    });

    it('should fail when a propagated binding conflicts', () => {
      expect(() => unify(P('X', 'X'), P('a', 'b'))).to.throw(
        NoUnifierError,
        'no unifier (conflict): a and b'
      );
    });

    it('should fail on arity mismatches', () => {
      expect(() => unify(P('X'), P('a', 'b')))
        .to.throw(NoUnifierError, 'no unifier (arity): P(X) and P(a, b)')
        .with.property('reason', 'arity');
    });
  });

  describe('clause unification', () => {
    it('should pair every same-named predicate across the clauses', () => {
      const sub = unify(and(P('X'), Q('X')), or(P('a'), P('Y')));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'a'],
        ['Y', 'a'],
      ]);
    });

    it('should fail when two literals force different bindings', () => {
      expect(() => unify(P('X'), and(P('a'), P('b')))).to.throw(
        NoUnifierError
      );
      expect(bindings(unifyPredicates(P('X'), P('a')))).to.deep.equal([
        ['X', 'a'],
      ]);
    });

    it('should ignore predicates without a partner', () => {
      expect(unify(P('X'), Q('a')).size).to.equal(0);
    });
  });

  describe('unifyPredicates', () => {
    it('should refuse predicates with different names', () => {
      expect(() => unifyPredicates(P('X'), Q('X')))
        .to.throw(NoUnifierError, 'no unifier (name): P(X) and Q(X)')
        .with.property('reason', 'name');
    });

    it('should unify a single pair', () => {
      const sub = unifyPredicates(Q('X', 'b'), Q('a', 'Y'));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'a'],
        ['Y', 'b'],
      ]);
    });
  });

  describe('skolem witnesses', () => {
    it('should rewrite captured variables in the remaining pairs', () => {
      const witness = new SkolemAllocator().fresh(['X']);
      const sub = unify(P('X', witness), P('a', 'Z'));
      expect(bindings(sub)).to.deep.equal([
        ['X', 'a'],
        ['Z', 'F_0(a)'],
      ]);
    });

    it('should unify the arguments of the same witness', () => {
      const witness = new SkolemAllocator().fresh(['X']);
      const other = apply(new Map([['X', ident('a')]]), witness);
      expect(bindings(unify(P(witness), P(other)))).to.deep.equal([
        ['X', 'a'],
      ]);
    });

    it('should not unify different witnesses', () => {
      const allocator = new SkolemAllocator();
      const first = allocator.fresh([]);
      const second = allocator.fresh([]);
      expect(() => unify(P(first), P(second))).to.throw(
        NoUnifierError,
        'no unifier (conflict): F_0() and F_1()'
      );
      expect(() => unify(P(first), P('a'))).to.throw(NoUnifierError);
    });

    it('should fail the occurs check', () => {
      const witness = new SkolemAllocator().fresh(['X']);
      expect(() => unify(P('X'), P(witness)))
        .to.throw(NoUnifierError, 'no unifier (occurs): X and F_0(X)')
        .with.property('reason', 'occurs');
    });
  });

  describe('properties', () => {
    const allocator = new SkolemAllocator();
    const f = allocator.fresh(['Y']);
    const g = allocator.fresh(['X']);
    const samples: [Clause, Clause][] = [
      [P('X', 'Y'), P('a', 'b')],
      [P('X', 'X'), P('Y', 'a')],
      [and(P('X'), Q('Y', 'X')), or(P('a'), Q('b', 'Z'))],
      [P('X', f), P('a', apply(new Map([['Y', ident('b')]]), f))],
      [P('X'), P(g)],
      [P('a'), P('b')],
      [and(P('X'), P('Y')), P('c')],
      [predicate('R', 'X', 'Y', 'Z'), predicate('R', 'Y', 'Z', 'a')],
      [P('X', 'X'), P('a', 'b')],
      [or(P('X'), Q('X', 'c')), and(P('Y'), Q('b', 'Y'))],
    ];

    it('should make every paired predicate identical', () => {
      for (const [x, y] of samples) {
        const sub = attempt(x, y);
        if (sub) {
          expect(verifyUnification(x, y, sub), `${render(x)} ~ ${render(y)}`)
            .to.be.true;
        }
      }
    });

    it('should succeed or fail regardless of argument order', () => {
      for (const [x, y] of samples) {
        const forward = attempt(x, y) === undefined;
        const backward = attempt(y, x) === undefined;
        expect(forward, `${render(x)} ~ ${render(y)}`).to.equal(backward);
      }
    });
  });
});
