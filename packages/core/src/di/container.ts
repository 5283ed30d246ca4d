import "reflect-metadata";
import createDebug from "debug";
import type { Debugger } from "debug";
import type {
  Type,
  Token,
  InjectionToken,
  Lifetime,
  Provider,
  ServiceContainer,
  ContainerOptions,
} from "@wirebox/types";
import {
  getProviderDependencyTokens,
  isClassProvider,
  isFactoryProvider,
  selectConstructorSignature,
} from "./dependency-tokens";
import { tokenToString } from "./token";
import {
  CircularDependencyError,
  InvalidRegistrationError,
  UnregisteredServiceError,
  UnresolvableDependenciesError,
  type MissingDependency,
} from "../errors/container-errors";

const baseDebug = createDebug("wirebox:core:di");

/**
 * One binding. `instance` is boxed so that a singleton whose value is falsy
 * still counts as materialized.
 */
type ServiceRegistration<T> = {
  token: Token<T>;
  lifetime: Lifetime;
  provider: Provider<T>;
  instance?: { value: T };
};

// Used for the internal map of registrations where we can't track each specific
// ServiceRegistration<T> type.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyRegistration = ServiceRegistration<any>;

function describeProvider(provider: Provider<unknown>): string {
  if (isClassProvider(provider)) return "class";
  if (isFactoryProvider(provider)) return "factory";
  return "value";
}

export class Container implements ServiceContainer {
  private registrations = new Map<InjectionToken, AnyRegistration>();
  private resolving = new Set<InjectionToken>();
  private edges = new Map<InjectionToken, Set<InjectionToken>>();
  private readonly defaultLifetime: Lifetime;
  private readonly debug: Debugger;

  constructor(options: ContainerOptions = {}) {
    this.defaultLifetime = options.defaultLifetime ?? "singleton";
    this.debug = baseDebug.extend(options.name ?? "default");
  }

  register<T>(token: Token<T>, provider: Provider<T>): void {
    if ("useValue" in provider) {
      this.registerSingletonInstance(token, provider.useValue);
      return;
    }
    this.store({ token, provider, lifetime: provider.lifetime ?? this.defaultLifetime });
  }

  registerClass<T>(target: Type<T>, lifetime: Lifetime = this.defaultLifetime): void {
    this.store({ token: target, provider: { useClass: target }, lifetime });
  }

  registerTransient<T>(token: Token<T>, implementation: Type<T>): void {
    this.store({ token, provider: { useClass: implementation }, lifetime: "transient" });
  }

  registerSingleton<T>(token: Token<T>, implementation: Type<T>): void {
    this.store({ token, provider: { useClass: implementation }, lifetime: "singleton" });
  }

  registerSingletonInstance<T>(token: Token<T>, instance: T): void {
    if (instance === null || instance === undefined) {
      throw new InvalidRegistrationError(token, "instance must not be null or undefined");
    }
    this.store({
      token,
      provider: { useValue: instance },
      lifetime: "singleton",
      instance: { value: instance },
    });
  }

  getService<T>(token: Token<T>): T {
    const name = tokenToString(token);
    const registration = this.lookup(token);
    if (!registration) {
      throw new UnregisteredServiceError(token, [...this.resolving]);
    }

    if (registration.instance) {
      this.debug("resolve %s → cached", name);
      return registration.instance.value;
    }

    if (this.resolving.has(token)) {
      throw new CircularDependencyError([...this.resolving, token]);
    }

    this.debug("resolve %s → constructing (%s)", name, registration.lifetime);
    this.resolving.add(token);
    try {
      const instance = this.create(registration);
      if (registration.lifetime === "singleton") {
        registration.instance = { value: instance };
      }
      return instance;
    } finally {
      this.resolving.delete(token);
    }
  }

  has(token: InjectionToken): boolean {
    return this.registrations.has(token);
  }

  getDependencies(token: InjectionToken): ReadonlySet<InjectionToken> {
    return this.edges.get(token) ?? new Set();
  }

  /**
   * Validates that all registered providers have resolvable dependencies.
   * Call once every binding is registered, before the first resolution.
   * Throws a descriptive error listing ALL missing dependencies at once.
   */
  validateDependencies(): void {
    this.debug("validateDependencies: %d registrations", this.registrations.size);
    const missing: MissingDependency[] = [];

    for (const [token, registration] of this.registrations) {
      if (registration.instance) continue;

      for (const dep of getProviderDependencyTokens(registration.provider)) {
        if (!this.registrations.has(dep)) {
          missing.push({ consumer: tokenToString(token), dependency: tokenToString(dep) });
        }
      }
    }

    if (missing.length > 0) {
      throw new UnresolvableDependenciesError(missing);
    }
  }

  private store<T>(registration: ServiceRegistration<T>): void {
    const name = tokenToString(registration.token);
    if (this.registrations.has(registration.token)) {
      this.debug("register %s replaces the previous binding", name);
    }
    this.debug(
      "register %s (%s, %s)",
      name,
      describeProvider(registration.provider),
      registration.lifetime,
    );
    this.registrations.set(registration.token, registration);
    this.edges.delete(registration.token);
  }

  private lookup<T>(token: Token<T>): ServiceRegistration<T> | undefined {
    // Keys are only ever stored alongside a registration of their own service type.
    return this.registrations.get(token);
  }

  private create<T>(registration: ServiceRegistration<T>): T {
    const { provider, token } = registration;

    if (isClassProvider(provider)) {
      const target = provider.useClass;
      const signature = selectConstructorSignature(target);
      this.debug(
        "construct %s deps=[%s]",
        tokenToString(target),
        signature.map(tokenToString).join(", "),
      );
      const deps = signature.map((dep) => this.getService(dep));
      const instance = new target(...deps);
      this.recordEdges(token, signature);
      return instance;
    }

    if (isFactoryProvider(provider)) {
      const inject = provider.inject ?? [];
      const deps = inject.map((dep) => this.getService(dep));
      const instance = provider.useFactory(...deps);
      this.recordEdges(token, inject);
      return instance;
    }

    return provider.useValue;
  }

  private recordEdges(from: InjectionToken, to: readonly InjectionToken[]): void {
    let set = this.edges.get(from);
    if (!set) {
      set = new Set();
      this.edges.set(from, set);
    }
    for (const dep of to) {
      set.add(dep);
    }
  }
}
