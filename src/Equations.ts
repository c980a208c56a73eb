/**
 * Equation front end: parse notebook-style ODE text, bind names to a fixed
 * state ordering and compile the result into a callable right-hand side.
 *
 * @since 0.1.0
 */

import { Cache, Context, Duration, Effect, Either, Equal, Hash, Layer } from "effect"
import type { EquationNode } from "./internal/equations/Ast.js"
import {
  type BindOptions,
  bindSystemEffect,
  bindSystemEither,
  type CompiledSystemSpec,
  DEFAULT_INDEPENDENT_VARIABLE,
} from "./internal/equations/Binder.js"
import { type CompiledSystem, compileSystem } from "./internal/equations/Compiler.js"
import type { EquationError, EquationParseError } from "./internal/equations/errors.js"
import { parseSystemEffect, parseSystemEither } from "./internal/equations/Parser.js"

export type * from "./internal/equations/Ast.js"
export type { BindOptions, BoundExpr, CompiledSystemSpec } from "./internal/equations/Binder.js"
export type { CompiledSystem, Evaluator } from "./internal/equations/Compiler.js"
export * from "./internal/equations/errors.js"
export { compileSystem } from "./internal/equations/Compiler.js"

/**
 * Parse equation text into its AST.
 *
 * @category Parsing
 * @since 0.1.0
 * @example
 * ```ts
 * const ast = yield* parseSystem("{D(x), D(y)} == {x - y, x*y}")
 * ```
 */
export const parseSystem: (source: string) => Effect.Effect<EquationNode, EquationParseError> = parseSystemEffect

/**
 * @category Parsing
 * @since 0.1.0
 */
export { parseSystemEither }

/**
 * Resolve identifiers and fix the state ordering.
 *
 * @category Binding
 * @since 0.1.0
 */
export const bindSystem = bindSystemEffect

/**
 * @category Binding
 * @since 0.1.0
 */
export { bindSystemEither }

/**
 * Parse, bind and compile in one pass.
 *
 * @category Compilation
 * @since 0.1.0
 */
export const buildSystem = (
  source: string,
  options: BindOptions = {},
): Effect.Effect<CompiledSystem, EquationError> =>
  parseSystem(source).pipe(
    Effect.flatMap((ast) => bindSystem(ast, options)),
    Effect.map(compileSystem),
  )

/**
 * Synchronous variant of {@link buildSystem}.
 *
 * @category Compilation
 * @since 0.1.0
 */
export const buildSystemEither = (
  source: string,
  options: BindOptions = {},
): Either.Either<CompiledSystem, EquationError> =>
  Either.flatMap(parseSystemEither(source), (ast): Either.Either<CompiledSystemSpec, EquationError> =>
    bindSystemEither(ast, options),
  ).pipe(Either.map(compileSystem))

/**
 * Collapse insignificant whitespace so formatting differences share a cache
 * entry.
 *
 * @category Compilation
 * @since 0.1.0
 */
export const normalizeSource = (source: string): string => source.trim().replace(/\s+/g, " ")

// JSON.stringify writes -0 as 0, which would share a cache entry with +0.
const encodeParameter = (value: number | undefined): number | string => (Object.is(value, -0) ? "-0" : (value ?? "?"))

const parameterKey = (parameters: Readonly<Record<string, number>>): string =>
  JSON.stringify(Object.keys(parameters).sort().map((name) => [name, encodeParameter(parameters[name])]))

/**
 * Cache key: equality ignores whitespace, while the original text is kept so
 * diagnostics point into what the caller wrote.
 */
class CompileKey implements Equal.Equal {
  readonly normalized: string
  readonly parameterKey: string

  constructor(
    readonly source: string,
    readonly parameters: Readonly<Record<string, number>>,
  ) {
    this.normalized = normalizeSource(source)
    this.parameterKey = parameterKey(parameters)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof CompileKey && that.normalized === this.normalized && that.parameterKey === this.parameterKey
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.string(this.normalized))(Hash.string(this.parameterKey)))
  }
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface SystemCompilerStats {
  readonly hits: number
  readonly misses: number
  readonly size: number
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface SystemCompilerService {
  readonly compile: (
    source: string,
    parameters?: Readonly<Record<string, number>>,
  ) => Effect.Effect<CompiledSystem, EquationError>
  readonly stats: Effect.Effect<SystemCompilerStats>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface SystemCompilerOptions {
  readonly capacity: number
  readonly independentVariable: string
}

/**
 * Memoising compiler. A system is built at most once per normalized text and
 * parameter set; failed builds are not retained.
 *
 * @category Services
 * @since 0.1.0
 */
export class SystemCompiler extends Context.Tag("effect-ode-jobs/SystemCompiler")<
  SystemCompiler,
  SystemCompilerService
>() {
  static readonly make = (options: SystemCompilerOptions): Effect.Effect<SystemCompilerService> =>
    Effect.gen(function* () {
      const cache = yield* Cache.make({
        capacity: options.capacity,
        timeToLive: Duration.infinity,
        lookup: (key: CompileKey) =>
          buildSystem(key.source, {
            independentVariable: options.independentVariable,
            parameters: key.parameters,
          }).pipe(Effect.tap(() => Effect.logDebug("compiled equation system").pipe(Effect.annotateLogs("source", key.normalized)))),
      })

      const compile = (source: string, parameters: Readonly<Record<string, number>> = {}) => {
        const key = new CompileKey(source, parameters)
        return cache.get(key).pipe(Effect.tapError(() => cache.invalidate(key)))
      }

      const stats = Effect.map(cache.cacheStats, ({ hits, misses, size }) => ({ hits, misses, size }))

      return { compile, stats } satisfies SystemCompilerService
    })

  static readonly layer = (options: SystemCompilerOptions) => Layer.effect(this, this.make(options))

  static readonly layerDefault = Layer.effect(
    this,
    this.make({ capacity: 256, independentVariable: DEFAULT_INDEPENDENT_VARIABLE }),
  )
}
