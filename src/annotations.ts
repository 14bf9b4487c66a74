/**
 * @module annotations
 * @description Call-time argument normalisation. A function's parameters
 * (declared with {@link withSignature}, or read from its own parameter list)
 * are bound against the actual call, each bound value passes through its
 * parameter's coercer, and the result is an argument list the function can
 * be invoked with plus a hashable key that is identical for every spelling
 * of the same call.
 *
 * JavaScript has no keyword arguments, so a call passes them as a trailing
 * {@link Keywords} marker built by {@link kwargs}. Keyword-only and
 * var-keyword values reach the callee as one trailing plain object.
 */

import { UsageError, ValidationError, describeKind } from "./errors";
import { FrozenMapping } from "./frozen-mapping";
import { strictOf, tuple } from "./strict";
import { isPlainRecord } from "./types";
import type { Coercer, TypeParam } from "./types";
import { log } from "./utils/logger";

/* ------------------------------------------------------------------
 * Keyword arguments
 * ------------------------------------------------------------------ */

/** Trailing call argument carrying keyword arguments by name. */
export class Keywords {
  readonly values: Readonly<Record<string, unknown>>;

  constructor(values: Readonly<Record<string, unknown>>) {
    this.values = Object.freeze({ ...values });
    Object.freeze(this);
  }
}

/**
 * @example
 * ```typescript
 * area(2, kwargs({ height: 3 }))
 * ```
 */
export function kwargs(values: Readonly<Record<string, unknown>>): Keywords {
  if (!isPlainRecord(values)) {
    throw new ValidationError(
      `keyword arguments must be a plain object, got ${describeKind(values)}`,
      values
    );
  }
  return new Keywords(values);
}

/* ------------------------------------------------------------------
 * Parameters and signatures
 * ------------------------------------------------------------------ */

export type ParameterKind =
  | "positional-only"
  | "positional-or-keyword"
  | "var-positional"
  | "keyword-only"
  | "var-keyword";

const KIND_ORDER: Record<ParameterKind, number> = {
  "positional-only": 0,
  "positional-or-keyword": 1,
  "var-positional": 2,
  "keyword-only": 3,
  "var-keyword": 4,
};

export interface ParameterSpec {
  name: string;
  /** Defaults to `"positional-or-keyword"`. */
  kind?: ParameterKind;
  /** Coercer applied to the bound value; the whole tuple/record for variadics. */
  type?: TypeParam<unknown>;
  /** Presence of the key (even with `undefined`) makes the parameter optional. */
  default?: unknown;
}

export class Parameter {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly type?: TypeParam<unknown>;
  readonly hasDefault: boolean;
  readonly default: unknown;
  readonly coerce?: Coercer<unknown>;

  constructor(spec: ParameterSpec) {
    this.name = spec.name;
    this.kind = spec.kind ?? "positional-or-keyword";
    this.type = spec.type;
    this.hasDefault = "default" in spec;
    this.default = spec.default;
    this.coerce = spec.type === undefined ? undefined : strictOf(spec.type);
    Object.freeze(this);
  }

  get variadic(): boolean {
    return this.kind === "var-positional" || this.kind === "var-keyword";
  }

  get positional(): boolean {
    return this.kind === "positional-only" || this.kind === "positional-or-keyword";
  }

  /** Whether a keyword argument of this name binds to this parameter. */
  get keyword(): boolean {
    return this.kind === "positional-or-keyword" || this.kind === "keyword-only";
  }

  toSpec(): ParameterSpec {
    const spec: ParameterSpec = { name: this.name, kind: this.kind, type: this.type };
    if (this.hasDefault) spec.default = this.default;
    return spec;
  }
}

type Callable = (...args: never[]) => unknown;

const declaredSignatures = new WeakMap<Callable, Signature>();
const introspectedSignatures = new WeakMap<Callable, Signature>();

function usage(message: string): UsageError {
  log.warn(message);
  return new UsageError(message);
}

export class Signature {
  readonly parameters: readonly Parameter[];
  private readonly byName: ReadonlyMap<string, Parameter>;

  /**
   * @param name - function name used in binding errors
   * @throws {UsageError} on duplicate names, out-of-order kinds, more than
   *   one variadic of a kind, a defaulted variadic, or a required positional
   *   parameter after a defaulted one
   */
  constructor(
    parameters: readonly (Parameter | ParameterSpec)[],
    readonly name = "<function>"
  ) {
    this.parameters = Object.freeze(
      parameters.map((p) => (p instanceof Parameter ? p : new Parameter(p)))
    );
    const byName = new Map<string, Parameter>();
    let previous: Parameter | undefined;
    let defaulted = false;

    for (const param of this.parameters) {
      if (byName.has(param.name)) {
        throw usage(`${name}(): duplicate parameter name '${param.name}'`);
      }
      byName.set(param.name, param);

      if (previous) {
        const order = KIND_ORDER[previous.kind] - KIND_ORDER[param.kind];
        if (order > 0 || (order === 0 && param.variadic)) {
          throw usage(
            `${name}(): ${param.kind} parameter '${param.name}' cannot follow ${previous.kind} parameter '${previous.name}'`
          );
        }
      }
      if (param.variadic && param.hasDefault) {
        throw usage(`${name}(): variadic parameter '${param.name}' cannot have a default`);
      }
      if (param.positional) {
        if (defaulted && !param.hasDefault) {
          throw usage(
            `${name}(): required parameter '${param.name}' follows a parameter with a default`
          );
        }
        defaulted ||= param.hasDefault;
      }
      previous = param;
    }
    this.byName = byName;
    Object.freeze(this);
  }

  /**
   * The declared signature of `fn`, or one read from its parameter list.
   * Read signatures know identifiers, defaults and the rest parameter; their
   * defaults are left for the function itself to apply.
   *
   * @throws {UsageError} for destructured parameters
   */
  static of(fn: Callable): Signature {
    const declared = declaredSignatures.get(fn);
    if (declared) return declared;
    let signature = introspectedSignatures.get(fn);
    if (!signature) {
      signature = new Signature(parseParameters(fn), fn.name || "<anonymous>");
      introspectedSignatures.set(fn, signature);
    }
    return signature;
  }

  get(name: string): Parameter | undefined {
    return this.byName.get(name);
  }

  /** True when the callee receives a trailing keywords object. */
  get acceptsKeywords(): boolean {
    return this.parameters.some(
      (p) => p.kind === "keyword-only" || p.kind === "var-keyword"
    );
  }

  /** Copy with the given parameters' types replaced. */
  withTypes(types: Readonly<Record<string, TypeParam<unknown>>>): Signature {
    for (const name of Object.keys(types)) {
      if (!this.byName.has(name)) {
        throw usage(`${this.name}(): no parameter named '${name}' to annotate`);
      }
    }
    return new Signature(
      this.parameters.map((p) =>
        p.name in types ? new Parameter({ ...p.toSpec(), type: types[p.name] }) : p
      ),
      this.name
    );
  }

  /**
   * Binds a call's arguments. A trailing {@link Keywords} argument supplies
   * keyword arguments.
   *
   * @throws {ValidationError} on too many positionals, an unexpected or
   *   duplicate keyword, or a missing required argument
   */
  bind(args: readonly unknown[]): BoundArguments {
    const last = args[args.length - 1];
    const keywords: Readonly<Record<string, unknown>> =
      last instanceof Keywords ? last.values : {};
    const positional = last instanceof Keywords ? args.slice(0, -1) : args;

    const bound = new Map<string, unknown>();
    const slots = this.parameters.filter((p) => p.positional);
    const varPositional = this.parameters.find((p) => p.kind === "var-positional");
    const varKeyword = this.parameters.find((p) => p.kind === "var-keyword");

    if (positional.length > slots.length && !varPositional) {
      throw new ValidationError(
        `${this.name}() takes ${slots.length} positional argument${slots.length === 1 ? "" : "s"} but ${positional.length} were given`,
        args
      );
    }
    slots.forEach((param, i) => {
      if (i < positional.length) bound.set(param.name, positional[i]);
    });

    const extraKeywords: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(keywords)) {
      const param = this.byName.get(key);
      if (param?.keyword) {
        if (bound.has(key)) {
          throw new ValidationError(
            `${this.name}() got multiple values for argument '${key}'`,
            args
          );
        }
        bound.set(key, value);
      } else if (varKeyword) {
        extraKeywords[key] = value;
      } else if (param?.kind === "positional-only") {
        throw new ValidationError(
          `${this.name}() got positional-only argument '${key}' passed as keyword`,
          args
        );
      } else {
        throw new ValidationError(
          `${this.name}() got an unexpected keyword argument '${key}'`,
          args
        );
      }
    }

    const missing: string[] = [];
    for (const param of this.parameters) {
      if (param.variadic || bound.has(param.name)) continue;
      if (param.hasDefault) bound.set(param.name, param.default);
      else missing.push(`'${param.name}'`);
    }
    if (missing.length > 0) {
      throw new ValidationError(
        `${this.name}() missing required argument${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
        args
      );
    }

    if (varPositional) {
      bound.set(varPositional.name, Object.freeze(positional.slice(slots.length)));
    }
    if (varKeyword) bound.set(varKeyword.name, extraKeywords);
    return new BoundArguments(this, bound);
  }
}

/* ------------------------------------------------------------------
 * Bound arguments
 * ------------------------------------------------------------------ */

/** Normalised call key: positional tuple and keyword mapping. */
export type CallKey = readonly [readonly unknown[], FrozenMapping<string, unknown>];

export class BoundArguments {
  constructor(
    readonly signature: Signature,
    private readonly values: ReadonlyMap<string, unknown>
  ) {}

  get(name: string): unknown {
    return this.values.get(name);
  }

  /**
   * Applies every parameter's coercer. A nullish value of a parameter that
   * declares a default means "absent" and is left as is.
   */
  coerce(): BoundArguments {
    const out = new Map<string, unknown>();
    for (const param of this.signature.parameters) {
      const value = this.values.get(param.name);
      if (!param.coerce || (param.hasDefault && value == null)) {
        out.set(param.name, value);
      } else if (param.kind === "var-positional") {
        out.set(param.name, tuple(param.coerce(value)));
      } else if (param.kind === "var-keyword") {
        const coerced = param.coerce(value);
        if (!isPlainRecord(coerced)) {
          throw new ValidationError(
            `${this.signature.name}(): coercer for '${param.name}' must return a plain object, got ${describeKind(coerced)}`,
            coerced
          );
        }
        out.set(param.name, coerced);
      } else {
        out.set(param.name, param.coerce(value));
      }
    }
    return new BoundArguments(this.signature, out);
  }

  /** Positional values, var-positional items included. */
  positional(): unknown[] {
    const out: unknown[] = [];
    for (const param of this.signature.parameters) {
      const value = this.values.get(param.name);
      if (param.positional) out.push(value);
      else if (param.kind === "var-positional" && Array.isArray(value)) out.push(...value);
    }
    return out;
  }

  /** Keyword-only values and var-keyword entries, by name. */
  keywords(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const param of this.signature.parameters) {
      const value = this.values.get(param.name);
      if (param.kind === "keyword-only") out[param.name] = value;
      else if (param.kind === "var-keyword" && isPlainRecord(value)) Object.assign(out, value);
    }
    return out;
  }

  /** Argument list for invoking the underlying function. */
  callArgs(): unknown[] {
    const args = this.positional();
    if (this.signature.acceptsKeywords) args.push(this.keywords());
    return args;
  }

  /**
   * Hashable normalisation of the call. Equal for positional and keyword
   * spellings of the same binding.
   */
  key(): CallKey {
    return Object.freeze([
      Object.freeze(this.positional()),
      new FrozenMapping(Object.entries(this.keywords())),
    ] as const);
  }
}

/* ------------------------------------------------------------------
 * Declared signatures and annotation wrappers
 * ------------------------------------------------------------------ */

/**
 * Declares `fn`'s parameters explicitly, for kinds a parameter list cannot
 * express (positional-only, keyword-only, var-keyword) or to attach types.
 */
export function withSignature<F extends Callable>(
  fn: F,
  parameters: readonly ParameterSpec[]
): F {
  declaredSignatures.set(fn, new Signature(parameters, fn.name || "<anonymous>"));
  return fn;
}

export type AnnotatedFunction<R> = (this: unknown, ...args: unknown[]) => R;

const annotatedTargets = new WeakMap<Callable, Callable>();

/** The function an {@link applyAnnotations} wrapper invokes, or `fn` itself. */
export function unwrapAnnotated(fn: Callable): Callable {
  return annotatedTargets.get(fn) ?? fn;
}

/**
 * Wraps `fn` so every call is bound, coerced and then forwarded with the
 * normalised arguments. `types` maps parameter names to type parameters and
 * overrides those of a declared signature. Coercion failures propagate
 * without invoking `fn`.
 *
 * @example
 * ```typescript
 * const f = applyAnnotations(function f(a, b) { return [a, b]; }, { a: String });
 * f(1, 2)                  // ["1", 2]
 * f(kwargs({ b: 2, a: 1 })) // ["1", 2]
 * ```
 */
export function applyAnnotations<R>(
  fn: (...args: never[]) => R,
  types: Readonly<Record<string, TypeParam<unknown>>> = {}
): AnnotatedFunction<R> {
  const signature = Signature.of(fn).withTypes(types);
  const target = unwrapAnnotated(fn);

  const annotated = function (this: unknown, ...args: unknown[]): R {
    const bound = signature.bind(args).coerce();
    return Reflect.apply(target, this, bound.callArgs());
  };
  Object.defineProperty(annotated, "name", { value: signature.name });

  declaredSignatures.set(annotated, signature);
  annotatedTargets.set(annotated, target);
  return annotated;
}

/* ------------------------------------------------------------------
 * Parameter-list introspection
 * ------------------------------------------------------------------ */

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const OPENERS = "([{";
const CLOSERS = ")]}";

/** Index just past the string or template literal opening at `start`. */
function skipString(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length && text[i] !== quote) i += text[i] === "\\" ? 2 : 1;
  return i + 1;
}

/** Index of the bracket closing the one at `open`. */
function closing(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipString(text, i) - 1;
    } else if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch) && --depth === 0) {
      return i;
    }
  }
  return text.length;
}

/** Source of the parameter list: `(...)` contents, or a bare arrow parameter. */
function parameterSource(source: string): string {
  let depth = 0;
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipString(source, i) - 1;
    } else if (depth === 0 && source.startsWith("=>", i)) {
      return source.slice(0, i).replace(/^\s*async\s+/, "");
    } else if (OPENERS.includes(ch)) {
      if (depth === 0 && ch === "(") return source.slice(i + 1, closing(source, i));
      depth++;
    } else if (CLOSERS.includes(ch)) {
      depth--;
    }
  }
  return "";
}

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipString(text, i) - 1;
    } else if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch)) {
      depth--;
    } else if (ch === "," && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function stripComments(text: string): string {
  return text.replace(/\/\*[\s\S]*?\*\/|\/\/[^\n]*/g, "").trim();
}

function parseParameters(fn: Callable): ParameterSpec[] {
  const fnName = fn.name || "<anonymous>";
  const source = fn.toString();
  // Bound and built-in functions hide their parameter list
  if (source.includes("[native code]")) {
    throw usage(
      `${fnName}(): parameters of a bound or native function cannot be read; declare them with withSignature`
    );
  }
  return splitTopLevel(parameterSource(source)).map((piece): ParameterSpec => {
    let text = stripComments(piece);
    const rest = text.startsWith("...");
    if (rest) text = text.slice(3).trim();
    if (text.startsWith("[") || text.startsWith("{")) {
      throw usage(
        `${fnName}(): destructured parameters cannot be bound by name; declare them with withSignature`
      );
    }
    const eq = text.indexOf("=");
    const name = (eq === -1 ? text : text.slice(0, eq)).trim();
    if (!IDENTIFIER.test(name)) {
      throw usage(`${fnName}(): cannot read parameter '${piece}'`);
    }
    if (rest) return { name, kind: "var-positional" };
    return eq === -1 ? { name } : { name, default: undefined };
  });
}
