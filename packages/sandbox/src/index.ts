// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

// Types
export type {
  QueryScalar,
  QueryValue,
  QueryRecord,
  TokenType,
  Token,
  ValueHelperName,
  HelperCall,
  QueryArgument,
  VerbCall,
  QueryChain,
  QueryValidationResult,
  ComparisonOperator,
  Conjunction,
  DatePart,
  Condition,
  Ordering,
  HavingClause,
  QueryPlan,
  AggregateFunction,
  EntityQuerySource,
  EntityTypeInfo,
  EntityTypeResolver,
  ExecutionFailureCode,
  ExecutionOutcome,
} from './types.js';

export { createEmptyPlan } from './types.js';

// Verbs
export type { BuilderVerb, TerminalVerb, ResultVerb, QueryVerb } from './verbs.js';
export {
  BUILDER_VERBS,
  TERMINAL_VERBS,
  RESULT_VERBS,
  VALUE_HELPERS,
  ALLOWED_QUERY_VERBS,
  canonicalVerb,
} from './verbs.js';

// Parser
export { tokenize, parseQuery } from './parser.js';

// Validator
export type { QueryValidatorOptions } from './validator.js';
export {
  QueryValidator,
  DENIED_QUERY_PATTERNS,
  validateQuery,
  isSafeQuery,
} from './validator.js';

// Interpreter
export type { InterpreterOptions } from './interpreter.js';
export { interpret } from './interpreter.js';

// Executor
export type { QueryExecutorOptions } from './executor.js';
export { QueryExecutor } from './executor.js';
