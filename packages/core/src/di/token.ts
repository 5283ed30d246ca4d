import type { InjectionToken, ServiceToken } from "@wirebox/types";

/**
 * Creates a key for a service that has no runtime class of its own.
 *
 * @example
 * ```typescript
 * interface Repository { find(id: string): User | undefined }
 * const REPOSITORY = createToken<Repository>("Repository");
 * container.registerTransient(REPOSITORY, InMemoryRepository);
 * ```
 */
export function createToken<T>(description: string): ServiceToken<T> {
  return Object.freeze({ description });
}

export function tokenToString(token: InjectionToken): string {
  if (typeof token === "function") return token.name;
  return token.description;
}
