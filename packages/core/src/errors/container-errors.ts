import type { InjectionToken, Type } from "@wirebox/types";
import { tokenToString } from "../di/token";

function formatPath(path: readonly InjectionToken[]): string {
  return path.map(tokenToString).join(" → ");
}

export class ContainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContainerError";
  }
}

export class UnregisteredServiceError extends ContainerError {
  constructor(
    public readonly token: InjectionToken,
    public readonly path: readonly InjectionToken[] = [],
  ) {
    super(
      path.length > 0
        ? `Service ${tokenToString(token)} is not registered (required by ${formatPath(path)})`
        : `Service ${tokenToString(token)} is not registered`,
    );
    this.name = "UnregisteredServiceError";
  }
}

export class NoPublicConstructorError extends ContainerError {
  constructor(public readonly implementation: unknown) {
    super(
      `No public constructor found for ${
        typeof implementation === "function" && implementation.name
          ? implementation.name
          : String(implementation)
      }`,
    );
    this.name = "NoPublicConstructorError";
  }
}

export class CircularDependencyError extends ContainerError {
  constructor(public readonly path: readonly InjectionToken[]) {
    super(`Circular dependency detected: ${formatPath(path)}`);
    this.name = "CircularDependencyError";
  }
}

export class MissingDependencyMetadataError extends ContainerError {
  constructor(
    public readonly target: Type,
    public readonly parameterIndex?: number,
  ) {
    super(
      parameterIndex === undefined
        ? `Class ${target.name} has constructor parameters but is not decorated with @Injectable(). ` +
            "Add @Injectable() to enable dependency injection, or use a factory provider."
        : `Cannot determine the type of parameter #${parameterIndex} of ${target.name}. ` +
            "Interface-typed parameters need an explicit @Inject(token).",
    );
    this.name = "MissingDependencyMetadataError";
  }
}

export class InvalidRegistrationError extends ContainerError {
  constructor(
    public readonly token: InjectionToken,
    reason: string,
  ) {
    super(`Invalid registration for ${tokenToString(token)}: ${reason}`);
    this.name = "InvalidRegistrationError";
  }
}

export type MissingDependency = { consumer: string; dependency: string };

export class UnresolvableDependenciesError extends ContainerError {
  constructor(public readonly missing: readonly MissingDependency[]) {
    const details = missing
      .map(({ consumer, dependency }) => `  ${consumer} requires ${dependency} — no provider registered`)
      .join("\n");
    super(`Unresolvable dependencies detected:\n\n${details}`);
    this.name = "UnresolvableDependenciesError";
  }
}
