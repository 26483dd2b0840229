import {
  Clause,
  ident,
  NodeKind,
  render,
  Skolem,
  transform,
  TransformFns,
} from './ast';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

/**
 * Monotonic source of skolem witness ids. Each pipeline run owns its
 * allocator, so runs with the same starting id produce the same output.
 */
export class SkolemAllocator {
  private next: number;

  constructor(start: number = 0) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(
        `skolem allocator must start at a non-negative integer, got ${start}`
      );
    }
    this.next = start;
  }

  /**
   * Allocates a witness over the given captured variables. Ids are strictly
   * increasing in allocation order.
   */
  fresh(captured: readonly string[]): Skolem {
    const id = this.next++;
    return { kind: NodeKind.Skolem, id, args: captured.map(ident) };
  }

  /** The id the next call to `fresh` will hand out. */
  peek(): number {
    return this.next;
  }
}

/**
 * Eliminates existential quantifiers. Every variable bound by a ∃ is replaced
 * by one skolem witness over the universally quantified variables enclosing
 * the ∃, in binding order:
 *
 *   ∀X ∃Y P(X, Y) → ∀X P(X, F_0(X))
 *
 * All occurrences of the same existential share the witness. Bound variable
 * names are expected to be unique within the clause. Implications and
 * negations are threaded through unchanged, but note that only clauses in
 * negation normal form give an equisatisfiable result.
 */
export function skolemize(f: Clause, allocator: SkolemAllocator): Clause {
  const scope: string[] = [];
  const witnesses: Map<string, Skolem> = new Map();

  const cbs: TransformFns = {
    Ident: (t) => witnesses.get(t.name) ?? t,
    ForAll: (f) => {
      // a universal rebinding an existential name hides the witness
      const hidden: [string, Skolem][] = [];
      for (const name of f.vars) {
        const witness = witnesses.get(name);
        if (witness) {
          hidden.push([name, witness]);
          witnesses.delete(name);
        }
      }

      const len = scope.length;
      scope.push(...f.vars);
      const arg = transform(f.arg, cbs);
      scope.length = len;

      for (const [name, witness] of hidden) witnesses.set(name, witness);
      return { kind: NodeKind.ForAll, vars: f.vars, arg };
    },
    ThereExists: (f) => {
      const previous: [string, Skolem | undefined][] = [];
      for (const name of f.vars) {
        previous.push([name, witnesses.get(name)]);
        const witness = allocator.fresh(scope);
        witnesses.set(name, witness);
        debugLogger.trace(
          LogComponent.SKOLEM,
          `${name} replaced by ${render(witness)}`
        );
      }

      const arg = transform(f.arg, cbs);

      for (const [name, witness] of previous) {
        if (witness) witnesses.set(name, witness);
        else witnesses.delete(name);
      }
      return arg;
    },
  };

  const res = transform(f, cbs);
  debugLogger.logClause(LogComponent.SKOLEM, LogLevel.DEBUG, 'skolemized', () =>
    render(res)
  );
  return res;
}
