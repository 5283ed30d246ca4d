// Constructor type for DI — uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// The container resolves actual parameter types at runtime.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Abstract classes are valid service keys but can never be a `useClass` target.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Opaque key for services that have no runtime class, such as interfaces.
 * Compared by reference: two tokens with the same description are distinct keys.
 */
export interface ServiceToken<T = unknown> {
  readonly description: string;
  /** Phantom slot carrying `T`; never set at runtime. */
  readonly __service?: T;
}

// Typed key accepted by registration and resolution.
export type Token<T = unknown> = AbstractType<T> | ServiceToken<T>;

// Any key the container can hold, regardless of its service type.
export type InjectionToken = Token;

export type Lifetime = "transient" | "singleton";

// Provider registration for the DI container
export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
  lifetime?: Lifetime;
};

export type FactoryProvider<T = unknown> = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T;
  inject?: InjectionToken[];
  lifetime?: Lifetime;
};

// Value providers are always singletons; the value is the instance.
export type ValueProvider<T = unknown> = {
  useValue: T;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;
