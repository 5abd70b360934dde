export type { CallArguments } from "./ports/call-arguments"
export type { CallableDescriptor } from "./ports/callable-descriptor"
export type { ContextStore } from "./ports/context-store"
export type { KeyFunction, MemoTarget } from "./ports/key-function"
export { DO_NOT_CACHE, type DoNotCache, isMarker, type Marker } from "./ports/marker"
export type { Parameter, ParameterDeclaration } from "./ports/parameter"

export { BindingError, type BindingErrorCode } from "./core/errors/binding-error"
export { KeyEncodingError, type KeyEncodingErrorCode } from "./core/errors/key-encoding-error"
export { SignatureError, type SignatureErrorCode } from "./core/errors/signature-error"

export { declaredParameters } from "./core/signature/declared-parameters"
export { bindArguments, locateParameter } from "./core/signature/bind-arguments"
export { callableIdentity, type IdentityParts } from "./core/identity/callable-identity"
export { createMemoTarget } from "./core/memo-target"

export { argumentKey } from "./core/keys/argument-key"
export { encodeArguments } from "./core/keys/encode-arguments"
export { type RequestLike, requestUserIpKey } from "./core/keys/request-user-ip-key"
export { staticKey } from "./core/keys/static-key"

export { type MemoizeOptions, Memoized, memoize } from "./core/memoized"
export {
  ContextMemoized,
  type MemoizeInContextOptions,
  memoizeInContext,
  memoizeInRequest,
} from "./core/context/context-memoized"
export { REQUEST_CACHE_NAMESPACE, RequestCache, requestCache } from "./core/context/request-cache"
export { defaultContextStore, WeakContextStore } from "./core/context/weak-context-store"
export { type BoundMemoizeOptions, createMemoizer, type Memoizer, type MemoizerOptions } from "./core/memoizer"

export {
  type ConfiguredMemoizer,
  createMemoizerFromConfig,
  type MemoizerFromConfigDeps,
} from "./config/create-memoizer-from-config"
export { type LoadMemoConfigOptions, loadMemoConfig } from "./config/load-memo-config"
export { type MemoConfig, type MemoEnvConfig, mapEnvToMemoConfig, memoEnvSchema } from "./config/schema"
