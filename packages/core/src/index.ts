// @regexforge/core entry point
//
// Public API:
// - PatternGenerator is the facade most consumers need: render, renderMany,
//   renderSet, count, enumerate, stream, seed, equals, concat, hasSource.
// - configure/resetConfig/getDefaultConfig manage the process-wide defaults
//   that generators snapshot at construction.
// - The parser, engines and category table are exported for tools that work
//   on the Pattern AST directly.

export {
  PatternGenerator,
  DEFAULT_MAX_ATTEMPTS,
  type PatternInput,
  type PatternGeneratorOptions,
  type RenderSetOptions,
  type EnumerateOptions,
} from './generator/pattern-generator.js';

// Configuration
export {
  configure,
  resetConfig,
  getDefaultConfig,
} from './config/defaults.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_MAX_REPEAT,
  resolveGeneratorConfig,
  validateConfig,
  type GeneratorConfig,
  type GeneratorOptions,
  type ResolvedConfig,
  type ConfigSource,
} from './types/options.js';

// Pattern AST and parser
export type * from './types/ast.js';
export { parsePattern } from './parser/pattern-parser.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';

// Engines
export {
  dispatchNode,
  type NodeHandlers,
  type NodeOf,
} from './engine/dispatch.js';
export { effectiveUpperBound } from './engine/bounds.js';
export { Renderer, type RendererOptions } from './engine/renderer.js';
export { Counter } from './engine/counter.js';
export {
  Enumerator,
  type Bindings,
  type Derivation,
} from './engine/enumerator.js';

// Character sets
export {
  ASCII_LETTERS,
  ASCII_LOWERCASE,
  ASCII_UPPERCASE,
  DIGITS,
  PUNCTUATION,
  WHITESPACE,
  CATEGORIES,
  buildCategoryTable,
  getCategoryTable,
  type CategoryTable,
} from './charset/categories.js';
export {
  ClassResolver,
  resolveClass,
  printableExcept,
  LINE_TERMINATORS,
} from './charset/class-resolver.js';

// Catalogs
export { ALPHABETS, getAlphabet, listAlphabets } from './catalog/alphabets.js';
export {
  PATTERNS,
  isPatternName,
  type PatternName,
} from './catalog/patterns.js';

// Counts
export {
  INFINITE,
  ONE,
  ZERO,
  add,
  compare,
  exceeds,
  finite,
  formatCardinality,
  isInfinite,
  isZero,
  multiply,
  powerSum,
  toNumber,
  type Cardinality,
} from './util/cardinality.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type ErrorDetail,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  RegexForgeError,
  PatternError,
  ConfigError,
  InvalidArgumentError,
  UnsupportedConstructError,
  GenerationError,
  CapacityError,
  IterationLimitError,
  isRegexForgeError,
  type ErrorContext,
  type ErrorParams,
  type SerializedError,
} from './types/errors.js';

// Randomness & metrics
export {
  XorShift32,
  fnv1a32,
  fnv1a32Bytes,
  seedToUint32,
  type Seed,
} from './util/rng.js';
export {
  MetricsCollector,
  METRIC_PHASES,
  type MetricPhase,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
