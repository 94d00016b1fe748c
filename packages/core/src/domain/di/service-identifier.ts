/**
 * @fileoverview ServiceIdentifier - Component and Service Identification
 *
 * @packageDocumentation
 * @module @kindling/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Defines the identifiers used to register and request components:
 * class constructors, typed tokens and plain string keys.
 *
 * ## Zero-Reflection Philosophy
 *
 * Nothing here inspects parameter types at runtime. A class declares what it
 * needs up front:
 *
 * ```typescript
 * class EconomyManager {
 *   static inject = [TimeManager, ILogger] as const;
 *   constructor(time: TimeManager, logger: ILogger) {}
 * }
 * ```
 *
 * and may list alternative signatures, tried from most to fewest parameters:
 *
 * ```typescript
 * class SaveManager {
 *   static injectSignatures = [[StorageManager, ILogger], [StorageManager], []] as const;
 * }
 * ```
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Abstract constructor type for abstract base classes used as service keys.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * A typed token standing in for an interface, which has no runtime value.
 *
 * @remarks
 * Tokens are compared by reference. The `type` member never holds a value;
 * it only carries `T` so that `resolve(token)` is typed.
 */
export interface ServiceToken<T> {
  readonly description: string;
  readonly key: symbol;
  readonly type?: T;
}

/**
 * ServiceIdentifier - Unified type for identifying components and services.
 *
 * @remarks
 * **Three Forms of Identification:**
 *
 * 1. **Constructor<T>** (concrete or abstract): class-based identification
 * 2. **ServiceToken<T>**: interface abstraction created with {@link createToken}
 * 3. **string**: configuration-driven keys; no type inference
 *
 * Registrations are keyed by the identifier value itself, so two classes that
 * happen to share a name are distinct services.
 */
export type ServiceIdentifier<T = unknown> =
  | Constructor<T>
  | AbstractConstructor<T>
  | ServiceToken<T>
  | string;

/**
 * Check if a value is a token created with {@link createToken}.
 */
export function isServiceToken(value: unknown): value is ServiceToken<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'symbol' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(UserService); // true (constructor)
 * isServiceIdentifier(createToken('ILogger')); // true (token)
 * isServiceIdentifier('my-service'); // true (string)
 * isServiceIdentifier(42); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  if (typeof value === 'string' || typeof value === 'function') {
    return true;
  }
  return isServiceToken(value);
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @example
 * ```typescript
 * getServiceName(UserService); // 'UserService'
 * getServiceName(createToken('ILogger')); // 'Symbol(ILogger)'
 * getServiceName('my-service'); // 'my-service'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'string') {
    return identifier;
  }

  if (isServiceToken(identifier)) {
    return identifier.key.toString();
  }

  return identifier.name || 'AnonymousClass';
}

// ============================================================================
// Dependency Declaration (Static Inject Pattern)
// ============================================================================

/**
 * Constructor carrying its dependency declaration as static properties.
 *
 * @remarks
 * - `inject`: the primary constructor signature, in parameter order.
 * - `injectSignatures`: alternative signatures; when present it replaces
 *   `inject` as the list of candidates.
 */
export interface IInjectableConstructor<T = unknown> extends Constructor<T> {
  inject?: readonly ServiceIdentifier[];
  injectSignatures?: readonly (readonly ServiceIdentifier[])[];
}

/**
 * Check if a constructor has a static `inject` array.
 */
export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Get dependencies from a constructor's static `inject` property.
 *
 * @returns The declared list, or an empty list when none is declared
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

/**
 * Get every constructor signature a class declares.
 *
 * @remarks
 * `injectSignatures` wins over `inject`. A class that declares neither has
 * no signatures; whether it can still be built without arguments is up to
 * the caller.
 */
export function getDeclaredSignatures(ctor: Constructor): readonly (readonly ServiceIdentifier[])[] {
  if ('injectSignatures' in ctor && Array.isArray(ctor.injectSignatures)) {
    const signatures: (readonly ServiceIdentifier[])[] = [];
    for (const signature of ctor.injectSignatures) {
      if (Array.isArray(signature) && signature.every(isServiceIdentifier)) {
        signatures.push(signature);
      }
    }
    return signatures;
  }
  return hasInjectProperty(ctor) ? [getInjectDependencies(ctor)] : [];
}

/**
 * Check if an identifier is a class constructor.
 */
export function isConstructor<T>(identifier: ServiceIdentifier<T>): identifier is Constructor<T> {
  return typeof identifier === 'function';
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token for interface abstraction.
 *
 * @example
 * ```typescript
 * interface IClock { now(): number; }
 * const IClock = createToken<IClock>('IClock');
 *
 * container.registerSingleton(IClock, SystemClock);
 * const clock = container.resolve(IClock); // typed as IClock
 * ```
 */
export function createToken<T>(description: string): ServiceToken<T> {
  return Object.freeze({ description, key: Symbol(description) });
}
