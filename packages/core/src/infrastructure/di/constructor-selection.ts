/**
 * @fileoverview Constructor Selection - Pick and invoke a constructor signature
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A class may declare several signatures. They are tried from most to fewest
 * parameters; a signature is skipped when one of its parameters cannot be
 * resolved. When none fits, a zero-argument construction is attempted if the
 * class allows it.
 *
 * ```typescript
 * class SaveManager {
 *   static injectSignatures = [[IStorage, ILogger], [IStorage]] as const;
 * }
 * // ILogger unregistered -> new SaveManager(storage)
 * ```
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type ResolutionResult,
  type ServiceIdentifier,
  CircularDependencyError,
  InstanceCreationError,
  getDeclaredSignatures,
  getServiceName,
  toError,
} from '../../domain/di';

/**
 * Signatures ordered by parameter count, most first. Ties keep declaration
 * order.
 *
 * @param override - Replaces the class's own declaration when given
 */
export function rankSignatures(
  ctor: Constructor,
  override?: readonly ServiceIdentifier[],
): readonly (readonly ServiceIdentifier[])[] {
  const signatures = override ? [override] : getDeclaredSignatures(ctor);
  return [...signatures].sort((a, b) => b.length - a.length);
}

/**
 * A class may be built with no arguments when its constructor takes none or
 * it declares an empty signature.
 */
export function allowsZeroArgs(
  ctor: Constructor,
  signatures: readonly (readonly ServiceIdentifier[])[],
): boolean {
  return ctor.length === 0 || signatures.some((signature) => signature.length === 0);
}

/**
 * Build an instance through the first satisfiable signature.
 *
 * @param resolveParameter - Resolves one parameter without throwing
 * @param resolutionPath - Names on the resolution stack, for error reports
 *
 * @throws CircularDependencyError from a parameter; never a reason to fall back
 * @throws InstanceCreationError when no signature fits or the constructor throws
 */
export function constructInstance<T>(
  identifier: ServiceIdentifier<T>,
  ctor: Constructor<T>,
  signatures: readonly (readonly ServiceIdentifier[])[],
  resolveParameter: (parameter: ServiceIdentifier) => ResolutionResult<unknown>,
  resolutionPath: string[] = [],
): T {
  let lastFailure: Error | undefined;

  for (const signature of signatures) {
    if (signature.length === 0) {
      continue;
    }

    const args: unknown[] = [];
    let satisfied = true;

    for (const parameter of signature) {
      const result = resolveParameter(parameter);
      if (!result.success) {
        if (result.error instanceof CircularDependencyError) {
          throw result.error;
        }
        lastFailure = result.error;
        satisfied = false;
        break;
      }
      args.push(result.value);
    }

    if (satisfied) {
      return invoke(identifier, ctor, args, resolutionPath);
    }
  }

  if (allowsZeroArgs(ctor, signatures)) {
    return invoke(identifier, ctor, [], resolutionPath);
  }

  const tried = signatures.map((signature) => `(${signature.map(getServiceName).join(', ')})`);
  throw new InstanceCreationError(
    identifier,
    tried.length > 0
      ? `no constructor signature could be satisfied; tried ${tried.join(', ')}`
      : `${ctor.name} takes ${ctor.length} parameter(s) but declares no injectable signature`,
    lastFailure,
    resolutionPath,
  );
}

function invoke<T>(
  identifier: ServiceIdentifier<T>,
  ctor: Constructor<T>,
  args: unknown[],
  resolutionPath: string[],
): T {
  try {
    return new ctor(...args);
  } catch (error) {
    const cause = toError(error);
    throw new InstanceCreationError(
      identifier,
      `constructor threw: ${cause.message}`,
      cause,
      resolutionPath,
    );
  }
}
