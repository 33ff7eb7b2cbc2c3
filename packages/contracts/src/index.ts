export { Address } from './Address';
export {
  CycleError,
  errorMessage,
  OperationTimeoutError,
  ParseError,
  ProviderError,
  SchemaError,
  StateLockedError,
  StratumError,
  UnresolvedReferenceError,
} from './errors';
export type { LockInfo } from './errors';
export type { CreateResult, IProvider, IResourceHandler } from './provider';
export type { DesiredState, OutputDeclaration, Resource, ResourceState } from './resource';
export type { ISchema, ISchemaDefinition, SchemaType } from './schema';
export { schemaIssues, validate } from './validate';
export { collectReferences, formatReference, fromLiteral, resolveValue, valuesEqual } from './values';
export type { ReferenceLookup, ReferenceTarget, ResolvedAttributes, ResolvedValue, Value } from './values';
