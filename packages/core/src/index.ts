import "reflect-metadata";

// Decorators
export { Injectable, Inject, Overload } from "./decorators/injectable";

// DI
export { Container } from "./di/container";
export { createToken, tokenToString } from "./di/token";
export {
  getClassDependencyTokens,
  getConstructorSignatures,
  selectConstructorSignature,
  isConstructor,
} from "./di/dependency-tokens";

// Errors
export {
  ContainerError,
  UnregisteredServiceError,
  NoPublicConstructorError,
  CircularDependencyError,
  MissingDependencyMetadataError,
  InvalidRegistrationError,
  UnresolvableDependenciesError,
} from "./errors/container-errors";

// Metadata constants
export { INJECTABLE_METADATA, INJECT_METADATA, OVERLOAD_METADATA } from "./metadata/constants";

// Re-export key types from @wirebox/types
export type {
  Type,
  AbstractType,
  ServiceToken,
  Token,
  InjectionToken,
  Lifetime,
  Provider,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  ServiceContainer,
  ContainerOptions,
} from "@wirebox/types";

// Re-export types defined in core
export type { ConstructorSignature } from "./di/dependency-tokens";
export type { MissingDependency } from "./errors/container-errors";
