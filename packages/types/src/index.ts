export type {
  Type,
  AbstractType,
  ServiceToken,
  Token,
  InjectionToken,
  Lifetime,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
} from "./common";

export type { ServiceContainer, ContainerOptions } from "./container";
