export {
  NodeKind,
  UnsupportedClauseKindError,
  InvalidQuantifierError,
  transform,
  isVariable,
  ident,
  predicate,
  not,
  and,
  or,
  implies,
  forAll,
  thereExists,
  construct,
  getFreeVars,
  equal,
  hash,
  render,
} from './ast';
export type {
  Ident,
  Skolem,
  Predicate,
  Not,
  And,
  Or,
  Implies,
  ForAll,
  ThereExists,
  Term,
  Clause,
  Node,
  TransformFns,
  NodeConstructor,
} from './ast';
export { SkolemAllocator, skolemize } from './skolem';
export {
  eliminateImplication,
  negate,
  pushNegationsDown,
  toNNF,
  isNNF,
} from './nnf';
export {
  distributeOr,
  dropUniversals,
  isMonolithicOr,
  isCNF,
  runPipeline,
  cnfStages,
  toCNF,
} from './cnf';
export type { DistributeConfig, CNFConfig, Stage } from './cnf';
export { extractPredicates, cnfToClauses, renderClause } from './clauses';
export type { Literal, CNFClause } from './clauses';
export { apply, unify, unifyPredicates, NoUnifierError } from './unify';
export type { Substitution, NoUnifierReason } from './unify';
export { DebugLogger, debugLogger, LogLevel, LogComponent } from './debug-logger';
export type { LogSink } from './debug-logger';
