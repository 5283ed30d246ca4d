import type { InjectionToken, Lifetime, Provider, Token, Type } from "./common";

export type ContainerOptions = {
  /** Suffix for the container's debug namespace. Defaults to `"default"`. */
  name?: string;
  /** Lifetime for `register` and `registerClass` calls that do not name one. Defaults to `"singleton"`. */
  defaultLifetime?: Lifetime;
};

/** Registration and resolution contract for a composition root. */
export interface ServiceContainer {
  register<T>(token: Token<T>, provider: Provider<T>): void;
  registerClass<T>(target: Type<T>, lifetime?: Lifetime): void;
  registerTransient<T>(token: Token<T>, implementation: Type<T>): void;
  registerSingleton<T>(token: Token<T>, implementation: Type<T>): void;
  registerSingletonInstance<T>(token: Token<T>, instance: T): void;
  getService<T>(token: Token<T>): T;
  has(token: InjectionToken): boolean;
}
