import "reflect-metadata";
import type { InjectionToken } from "@wirebox/types";
import { INJECTABLE_METADATA, INJECT_METADATA, OVERLOAD_METADATA } from "../metadata/constants";

export function Injectable(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
  };
}

export function Inject(token: InjectionToken): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: Map<number, InjectionToken> =
      Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(parameterIndex, token);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}

/**
 * Declares an additional constructor signature for a class, mirroring a
 * TypeScript overload that leaves no trace at runtime.
 *
 * Class decorators apply bottom-up, so each signature is prepended to keep
 * the stored list in source order.
 */
export function Overload(...tokens: InjectionToken[]): ClassDecorator {
  return (target) => {
    const existing: InjectionToken[][] = Reflect.getOwnMetadata(OVERLOAD_METADATA, target) ?? [];
    Reflect.defineMetadata(OVERLOAD_METADATA, [tokens, ...existing], target);
  };
}
