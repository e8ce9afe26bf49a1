export {
  CachedResourceService,
  type CachedResourceServiceDeps,
  type CachedResourceServiceOptions,
} from "./core/cached-resource-service"
export { deriveItemKey, deriveListKey, deriveTags, type RecordTags } from "./core/derive-keys"
export {
  type Mutation,
  MutationInvalidator,
  type MutationInvalidatorDeps,
} from "./core/mutation-invalidator"
export type { ScopedResource } from "./ports/scoped-resource"
