export { configure, ConfigManager } from "./config";
export { registry } from "./metrics";

export {
  NAMESPACE,
  canonicalBytes,
  canonicalHash,
  compareDigests,
  digest,
  digestHex,
  orderedDigest,
  unorderedDigest,
} from "./hash";
export { Complex } from "./complex";
export { kinds } from "./kinds";
export { strict, strictbool, strictfloat, strictint, strictstr, tuple } from "./strict";
export { FrozenMapping } from "./frozen-mapping";
export { FrozenSet } from "./frozen-set";
export { CODEC_VERSION, deserialize, serialize } from "./codec";
export {
  BoundArguments,
  Keywords,
  Parameter,
  Signature,
  applyAnnotations,
  kwargs,
  withSignature,
} from "./annotations";
export { cacheStats, withCache } from "./cache";
export {
  CanonkeyError,
  IllegalMutationError,
  NotFoundError,
  UnhashableValueError,
  UsageError,
  ValidationError,
} from "./errors";
export { TypeToken, customDigest } from "./types";

export type {
  CanonkeyInit,
  Coercer,
  Digest,
  Digestible,
  HashAlgo,
  KindName,
  LogLevel,
  StrictType,
  TypeParam,
} from "./types";
export type { AnnotatedFunction, CallKey, ParameterKind, ParameterSpec } from "./annotations";
export type { Encoded } from "./codec";
export type { ErrorCode } from "./errors";
