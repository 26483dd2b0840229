/**
 * Types of nodes in the first-order logic syntax tree:
 */
export const enum NodeKind {
  Ident, // name token: variable X or constant a
  Skolem, // skolem witness F_n(X_1, ..., X_n)
  Predicate, // atomic formula R(t_1, ..., t_n)
  Not, // negation of a clause
  And, // conjunction of two clauses
  Or, // disjunction of two clauses
  Implies, // implication of two clauses
  ForAll, // universal quantification of a clause
  ThereExists, // existential quantification of a clause
}

const KIND_NAMES: readonly string[] = [
  'Ident',
  'Skolem',
  'Predicate',
  'Not',
  'And',
  'Or',
  'Implies',
  'ForAll',
  'ThereExists',
];

/**
 * Name token. Whether it is a variable or a constant is decided by the
 * spelling of the name, see `isVariable`.
 */
export type Ident = { readonly kind: NodeKind.Ident; readonly name: string };

/**
 * Skolem witness with a unique allocation id. The arguments are the
 * universally quantified variables captured when the witness was introduced.
 */
export type Skolem = {
  readonly kind: NodeKind.Skolem;
  readonly id: number;
  readonly args: readonly Term[];
};

/** Atomic formula with a relation name and argument terms. */
export type Predicate = {
  readonly kind: NodeKind.Predicate;
  readonly name: string;
  readonly args: readonly Term[];
};

/** Negation of a clause. */
export type Not = { readonly kind: NodeKind.Not; readonly arg: Clause };

/** Conjunction of two clauses. */
export type And = {
  readonly kind: NodeKind.And;
  readonly left: Clause;
  readonly right: Clause;
};

/** Disjunction of two clauses. */
export type Or = {
  readonly kind: NodeKind.Or;
  readonly left: Clause;
  readonly right: Clause;
};

/** Implication between two clauses. */
export type Implies = {
  readonly kind: NodeKind.Implies;
  readonly left: Clause;
  readonly right: Clause;
};

/** Universal quantification over variables. */
export type ForAll = {
  readonly kind: NodeKind.ForAll;
  readonly vars: readonly string[];
  readonly arg: Clause;
};

/** Existential quantification over variables. */
export type ThereExists = {
  readonly kind: NodeKind.ThereExists;
  readonly vars: readonly string[];
  readonly arg: Clause;
};

/**
 * Represents a first-order term, which is either a name token or a skolem
 * witness introduced while eliminating existential quantifiers.
 */
export type Term = Ident | Skolem;

/**
 * Represents a first-order clause, which is either a predicate applied to
 * terms or a logical combination of clauses.
 */
export type Clause =
  | Predicate
  | Not
  | And
  | Or
  | Implies
  | ForAll
  | ThereExists;

export type Node = Term | Clause;

/**
 * Raised by a traversal that meets a node kind it has no rule for. Either a
 * stage precondition was violated (e.g. an implication reaching a pass that
 * expects them to be eliminated already) or the node is malformed.
 */
export class UnsupportedClauseKindError extends Error {
  public readonly kind: string;

  constructor(
    public readonly node: unknown,
    public readonly pass: string
  ) {
    const kind = describeKind(node);
    super(`clause of kind ${kind} is not supported by ${pass}`);
    this.name = 'UnsupportedClauseKindError';
    this.kind = kind;
  }
}

/**
 * Raised when a quantifier is built with an empty or repeating variable list.
 */
export class InvalidQuantifierError extends Error {
  constructor(public readonly vars: readonly string[]) {
    super(
      `quantifier variables must be a non-empty list of distinct names, got (${vars.join(', ')})`
    );
    this.name = 'InvalidQuantifierError';
  }
}

function describeKind(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'kind' in node) {
    if (typeof node.kind === 'number') {
      return KIND_NAMES[node.kind] ?? `#${node.kind}`;
    }
    return String(node.kind);
  }
  return typeof node;
}

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Ident?: (f: Ident) => Term;
  Skolem?: (f: Skolem) => Term;
  Predicate?: (f: Predicate) => Clause;
  Not?: (f: Not) => Clause;
  And?: (f: And) => Clause;
  Or?: (f: Or) => Clause;
  Implies?: (f: Implies) => Clause;
  ForAll?: (f: ForAll) => Clause;
  ThereExists?: (f: ThereExists) => Clause;
};

/**
 * Helper for transforming clauses. Kinds without a callback are rebuilt as a
 * new node of the same kind with transformed children.
 */
export function transform(f: Clause, cbs: TransformFns): Clause;
export function transform(f: Term, cbs: TransformFns): Term;
export function transform(f: Node, cbs: TransformFns): Node;
export function transform(f: Node, cbs: TransformFns): Node {
  switch (f.kind) {
    case NodeKind.Ident:
      return cbs.Ident ? cbs.Ident(f) : f;
    case NodeKind.Skolem: {
      if (cbs.Skolem) return cbs.Skolem(f);
      return {
        ...f,
        args: f.args.map((arg) => transform(arg, cbs)),
      };
    }
    case NodeKind.Predicate: {
      if (cbs.Predicate) return cbs.Predicate(f);
      return {
        ...f,
        args: f.args.map((arg) => transform(arg, cbs)),
      };
    }
    case NodeKind.Not: {
      if (cbs.Not) return cbs.Not(f);
      return {
        ...f,
        arg: transform(f.arg, cbs),
      };
    }
    case NodeKind.And: {
      if (cbs.And) return cbs.And(f);
      return {
        ...f,
        left: transform(f.left, cbs),
        right: transform(f.right, cbs),
      };
    }
    case NodeKind.Or: {
      if (cbs.Or) return cbs.Or(f);
      return {
        ...f,
        left: transform(f.left, cbs),
        right: transform(f.right, cbs),
      };
    }
    case NodeKind.Implies: {
      if (cbs.Implies) return cbs.Implies(f);
      return {
        ...f,
        left: transform(f.left, cbs),
        right: transform(f.right, cbs),
      };
    }
    case NodeKind.ForAll: {
      if (cbs.ForAll) return cbs.ForAll(f);
      return {
        ...f,
        arg: transform(f.arg, cbs),
      };
    }
    case NodeKind.ThereExists: {
      if (cbs.ThereExists) return cbs.ThereExists(f);
      return {
        ...f,
        arg: transform(f.arg, cbs),
      };
    }
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'transform');
    }
  }
}

/**
 * Returns true if the term is a logical variable, i.e. a name token starting
 * with an uppercase letter. Skolem witnesses are never variables.
 */
export function isVariable(t: Term): boolean {
  return t.kind === NodeKind.Ident && /^\p{Lu}/u.test(t.name);
}

function validateVars(vars: readonly string[]): readonly string[] {
  if (vars.length === 0 || new Set(vars).size !== vars.length) {
    throw new InvalidQuantifierError(vars);
  }
  return [...vars];
}

const toTerm = (t: Term | string): Term =>
  typeof t === 'string' ? ident(t) : t;

export function ident(name: string): Ident {
  return { kind: NodeKind.Ident, name };
}

/**
 * Builds a predicate. Plain strings are accepted as shorthand for name tokens.
 */
export function predicate(name: string, ...args: (Term | string)[]): Predicate {
  return { kind: NodeKind.Predicate, name, args: args.map(toTerm) };
}

export function not(arg: Clause): Not {
  return { kind: NodeKind.Not, arg };
}

export function and(left: Clause, right: Clause): And {
  return { kind: NodeKind.And, left, right };
}

export function or(left: Clause, right: Clause): Or {
  return { kind: NodeKind.Or, left, right };
}

export function implies(left: Clause, right: Clause): Implies {
  return { kind: NodeKind.Implies, left, right };
}

export function forAll(vars: readonly string[], arg: Clause): ForAll {
  return { kind: NodeKind.ForAll, vars: validateVars(vars), arg };
}

export function thereExists(vars: readonly string[], arg: Clause): ThereExists {
  return { kind: NodeKind.ThereExists, vars: validateVars(vars), arg };
}

export type NodeConstructor<T> = (fns: {
  ident: typeof ident;
  predicate: typeof predicate;
  not: typeof not;
  and: typeof and;
  or: typeof or;
  implies: typeof implies;
  forAll: typeof forAll;
  thereExists: typeof thereExists;
}) => T;

/**
 * Hands the node constructors to a callback, which keeps larger literal
 * formulas readable:
 *
 *   construct(({ forAll, predicate }) => forAll(['X'], predicate('P', 'X')))
 */
export function construct<T>(nc: NodeConstructor<T>): T {
  return nc({ ident, predicate, not, and, or, implies, forAll, thereExists });
}

/**
 * Returns the names of the free variables in a clause or term, in order of
 * first occurrence.
 */
export function getFreeVars(f: Node): string[] {
  const vars: string[] = [];
  const seen: Set<string> = new Set();
  const isBoundVar: Set<string> = new Set();

  const visitNode = (f: Node): void => {
    switch (f.kind) {
      case NodeKind.Ident:
        if (isVariable(f) && !isBoundVar.has(f.name) && !seen.has(f.name)) {
          seen.add(f.name);
          vars.push(f.name);
        }
        break;
      case NodeKind.Skolem:
      case NodeKind.Predicate:
        f.args.forEach(visitNode);
        break;
      case NodeKind.Not:
        visitNode(f.arg);
        break;
      case NodeKind.And:
      case NodeKind.Or:
      case NodeKind.Implies:
        visitNode(f.left);
        visitNode(f.right);
        break;
      case NodeKind.ForAll:
      case NodeKind.ThereExists: {
        const bound: string[] = [];
        for (const name of f.vars) {
          // edge-case where variable reused
          if (!isBoundVar.has(name)) {
            bound.push(name);
            isBoundVar.add(name);
          }
        }

        visitNode(f.arg);
        for (const name of bound) isBoundVar.delete(name);
        break;
      }
      default: {
        const _exhaustive: never = f;
        throw new UnsupportedClauseKindError(_exhaustive, 'getFreeVars');
      }
    }
  };

  visitNode(f);
  return vars;
}

const sameVars = (a: readonly string[], b: readonly string[]): boolean =>
  a.length == b.length && a.every((v, i) => v == b[i]);

const sameArgs = (a: readonly Term[], b: readonly Term[]): boolean =>
  a.length == b.length && a.every((sub, i) => equal(sub, b[i]));

/**
 * Returns true if the given nodes are equal syntactically. Predicates compare
 * by name and arguments, skolem terms by allocation id and arguments.
 */
export function equal(f: Node, g: Node): boolean {
  switch (f.kind) {
    case NodeKind.Ident:
      if (g.kind != NodeKind.Ident) return false;
      return f.name == g.name;
    case NodeKind.Skolem:
      if (g.kind != NodeKind.Skolem) return false;
      return f.id == g.id && sameArgs(f.args, g.args);
    case NodeKind.Predicate:
      if (g.kind != NodeKind.Predicate) return false;
      return f.name == g.name && sameArgs(f.args, g.args);
    case NodeKind.Not:
      if (g.kind != NodeKind.Not) return false;
      return equal(f.arg, g.arg);
    case NodeKind.And:
      if (g.kind != NodeKind.And) return false;
      return equal(f.left, g.left) && equal(f.right, g.right);
    case NodeKind.Or:
      if (g.kind != NodeKind.Or) return false;
      return equal(f.left, g.left) && equal(f.right, g.right);
    case NodeKind.Implies:
      if (g.kind != NodeKind.Implies) return false;
      return equal(f.left, g.left) && equal(f.right, g.right);
    case NodeKind.ForAll:
      if (g.kind != NodeKind.ForAll) return false;
      return sameVars(f.vars, g.vars) && equal(f.arg, g.arg);
    case NodeKind.ThereExists:
      if (g.kind != NodeKind.ThereExists) return false;
      return sameVars(f.vars, g.vars) && equal(f.arg, g.arg);
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'equal');
    }
  }
}

function hashCombine(h: number, x: number): number {
  h ^= x + 0x9e3779b9 + (h << 6) + (h >>> 2);
  return h >>> 0;
}

function hashString(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Structural hash over the same fields `equal` compares, so equal nodes
 * always hash equally.
 */
export function hash(f: Node): number {
  switch (f.kind) {
    case NodeKind.Ident:
      return hashCombine(f.kind, hashString(f.name));
    case NodeKind.Skolem:
      return f.args.reduce(
        (h, arg) => hashCombine(h, hash(arg)),
        hashCombine(f.kind, f.id)
      );
    case NodeKind.Predicate:
      return f.args.reduce(
        (h, arg) => hashCombine(h, hash(arg)),
        hashCombine(f.kind, hashString(f.name))
      );
    case NodeKind.Not:
      return hashCombine(f.kind, hash(f.arg));
    case NodeKind.And:
    case NodeKind.Or:
    case NodeKind.Implies:
      return hashCombine(hashCombine(f.kind, hash(f.left)), hash(f.right));
    case NodeKind.ForAll:
    case NodeKind.ThereExists:
      return hashCombine(
        f.vars.reduce<number>(
          (h, v) => hashCombine(h, hashString(v)),
          f.kind
        ),
        hash(f.arg)
      );
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'hash');
    }
  }
}

/**
 * Renders a node in the debug grammar, e.g. `(for_all (X) (P(X) or Q(a)))`.
 * There is no parser for this format.
 */
export function render(f: Node): string {
  switch (f.kind) {
    case NodeKind.Ident:
      return f.name;
    case NodeKind.Skolem:
      return `F_${f.id}(${f.args.map(render).join(', ')})`;
    case NodeKind.Predicate:
      return `${f.name}(${f.args.map(render).join(', ')})`;
    case NodeKind.Not:
      return `(not ${render(f.arg)})`;
    case NodeKind.And:
      return `(${render(f.left)} and ${render(f.right)})`;
    case NodeKind.Or:
      return `(${render(f.left)} or ${render(f.right)})`;
    case NodeKind.Implies:
      return `(${render(f.left)} -> ${render(f.right)})`;
    case NodeKind.ForAll:
      return `(for_all (${f.vars.join(', ')}) ${render(f.arg)})`;
    case NodeKind.ThereExists:
      return `(there_exists (${f.vars.join(', ')}) ${render(f.arg)})`;
    default: {
      const _exhaustive: never = f;
      throw new UnsupportedClauseKindError(_exhaustive, 'render');
    }
  }
}
