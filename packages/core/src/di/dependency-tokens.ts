import "reflect-metadata";
import type {
  Type,
  InjectionToken,
  Provider,
  ClassProvider,
  FactoryProvider,
} from "@wirebox/types";
import { INJECTABLE_METADATA, INJECT_METADATA, OVERLOAD_METADATA } from "../metadata/constants";
import { MissingDependencyMetadataError, NoPublicConstructorError } from "../errors/container-errors";

export type ConstructorSignature = readonly InjectionToken[];

export function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

export function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

/**
 * Checks that `value` can be invoked with `new`. Uses it as the `newTarget`
 * of a throwaway construction, so `value` itself is never called.
 */
export function isConstructor(value: unknown): value is Type {
  if (typeof value !== "function") return false;
  try {
    Reflect.construct(Object, [], value);
    return true;
  } catch {
    return false;
  }
}

function toDependencyTokens(
  target: Type,
  paramTypes: readonly (Type | undefined)[],
  injectOverrides: Map<number, InjectionToken> = new Map(),
): InjectionToken[] {
  return paramTypes.map((paramType, index) => {
    const override = injectOverrides.get(index);
    if (override) return override;
    // Interfaces and unions reflect as Object; import cycles reflect as undefined.
    if (paramType === undefined || paramType === Object) {
      throw new MissingDependencyMetadataError(target, index);
    }
    return paramType;
  });
}

function ancestorTakesArguments(target: Type): boolean {
  let ancestor: unknown = Object.getPrototypeOf(target);
  while (typeof ancestor === "function" && ancestor !== Function.prototype) {
    if (ancestor.length > 0) return true;
    ancestor = Object.getPrototypeOf(ancestor);
  }
  return false;
}

/**
 * Reads reflect-metadata to determine the implementation signature of a class.
 * Applies @Inject() overrides where present. Returns undefined when the class
 * carries no usable metadata.
 *
 * A subclass without a constructor of its own inherits its parent's, so it also
 * inherits the parent's paramtypes and @Inject() overrides. A subclass that
 * declares its own constructor only ever uses its own metadata.
 *
 * Pure function — reads metadata only, no container side effects.
 */
export function getClassDependencyTokens(target: Type): InjectionToken[] | undefined {
  const ownParamTypes: (Type | undefined)[] | undefined = Reflect.getOwnMetadata(
    "design:paramtypes",
    target,
  );

  if (Reflect.getOwnMetadata(INJECTABLE_METADATA, target) !== true) {
    // An implicit constructor has length 0 and forwards its arguments to the parent.
    if (target.length > 0) return undefined;

    const inheritedParamTypes: (Type | undefined)[] =
      Reflect.getMetadata("design:paramtypes", target) ?? [];
    if (!ownParamTypes && Reflect.getMetadata(INJECTABLE_METADATA, target) === true) {
      return toDependencyTokens(
        target,
        inheritedParamTypes,
        Reflect.getMetadata(INJECT_METADATA, target),
      );
    }
    return inheritedParamTypes.length === 0 && !ancestorTakesArguments(target) ? [] : undefined;
  }

  if (ownParamTypes) {
    return toDependencyTokens(
      target,
      ownParamTypes,
      Reflect.getOwnMetadata(INJECT_METADATA, target),
    );
  }

  return toDependencyTokens(
    target,
    Reflect.getMetadata("design:paramtypes", target) ?? [],
    Reflect.getMetadata(INJECT_METADATA, target),
  );
}

/**
 * Lists every constructor signature known for a class: the implementation
 * signature first (when available), then @Overload() declarations in source order.
 */
export function getConstructorSignatures(target: Type): ConstructorSignature[] {
  const signatures: ConstructorSignature[] = [];
  const implementation = getClassDependencyTokens(target);
  if (implementation) signatures.push(implementation);

  const overloads: InjectionToken[][] = Reflect.getOwnMetadata(OVERLOAD_METADATA, target) ?? [];
  signatures.push(...overloads);
  return signatures;
}

/**
 * Picks the signature with the most parameters. Ties go to the earliest
 * declared signature.
 */
export function selectConstructorSignature(target: unknown): ConstructorSignature {
  if (!isConstructor(target)) {
    throw new NoPublicConstructorError(target);
  }

  const signatures = getConstructorSignatures(target);
  if (signatures.length === 0) {
    throw new MissingDependencyMetadataError(target);
  }

  return signatures.reduce((best, candidate) => (candidate.length > best.length ? candidate : best));
}

/**
 * Determines the dependency tokens for a provider (class, factory, or value).
 *
 * Pure function — reads metadata only, no container side effects.
 */
export function getProviderDependencyTokens<T>(provider: Provider<T>): InjectionToken[] {
  if (isClassProvider(provider)) {
    return [...selectConstructorSignature(provider.useClass)];
  }
  if (isFactoryProvider(provider) && provider.inject) {
    return [...provider.inject];
  }
  return [];
}
