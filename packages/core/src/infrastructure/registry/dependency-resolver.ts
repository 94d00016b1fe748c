/**
 * @fileoverview DependencyResolver - Graph validation and cycle detection
 *
 * @packageDocumentation
 * @module @kindling/core/infrastructure/registry
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Validation is a pure function of the registrations and their edges. It
 * collects every problem in one pass:
 *
 * - missing dependencies (edge targets that are not registered)
 * - the first cycle met by a depth-first search in registration order
 * - warnings, which never invalidate
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  MissingDependencyError,
  getServiceName,
  isConstructor,
  isDependencyAware,
} from '../../domain/di';
import {
  type ComponentRegistration,
  type DependencyEdges,
  type MissingDependency,
  type ValidationResult,
} from '../../domain/registry';

// ============================================================================
// Cycle Detection
// ============================================================================

/**
 * Depth-first search for the first cycle.
 *
 * @remarks
 * Nodes are visited in the given order, neighbours in declaration order.
 * Neighbours outside `nodes` are ignored. The result is closed: its last
 * element repeats the first (`[X, Y, X]`; a self-dependency gives `[X, X]`).
 *
 * @returns the cycle, or an empty array when the graph is acyclic
 */
export function findFirstCycle(
  nodes: readonly ServiceIdentifier[],
  edges: DependencyEdges,
): ServiceIdentifier[] {
  const domain = new Set(nodes);
  const visited = new Set<ServiceIdentifier>();
  const onStack = new Set<ServiceIdentifier>();
  const path: ServiceIdentifier[] = [];

  const visit = (node: ServiceIdentifier): ServiceIdentifier[] => {
    visited.add(node);
    onStack.add(node);
    path.push(node);

    for (const neighbour of edges.get(node) ?? []) {
      if (!domain.has(neighbour)) {
        continue;
      }
      if (onStack.has(neighbour)) {
        return [...path.slice(path.indexOf(neighbour)), neighbour];
      }
      if (!visited.has(neighbour)) {
        const cycle = visit(neighbour);
        if (cycle.length > 0) {
          return cycle;
        }
      }
    }

    onStack.delete(node);
    path.pop();
    return [];
  };

  for (const node of nodes) {
    if (!visited.has(node)) {
      const cycle = visit(node);
      if (cycle.length > 0) {
        return cycle;
      }
    }
  }

  return [];
}

/**
 * Rotate a closed cycle so it starts at its smallest name.
 *
 * @example
 * ```typescript
 * canonicalizeCycle(['Y', 'X', 'Y']); // ['X', 'Y', 'X']
 * ```
 */
export function canonicalizeCycle(names: readonly string[]): string[] {
  const first = names[0];
  if (first === undefined) {
    return [];
  }

  const open = names.length > 1 && names[names.length - 1] === first ? names.slice(0, -1) : [...names];

  let start = 0;
  open.forEach((name, index) => {
    if (name < (open[start] ?? name)) {
      start = index;
    }
  });

  const rotated = [...open.slice(start), ...open.slice(0, start)];
  return [...rotated, rotated[0] ?? first];
}

// ============================================================================
// DependencyResolver
// ============================================================================

/**
 * DependencyResolver - Validate a registration set and its edges.
 *
 * @example
 * ```typescript
 * const result = new DependencyResolver().validate(registrations, edges);
 * if (!result.isValid) {
 *   result.missingDependencyMessages.forEach((m) => logger.error(m));
 * }
 * ```
 */
export class DependencyResolver {
  validate(
    registrations: readonly ComponentRegistration[],
    edges: DependencyEdges,
  ): ValidationResult {
    const registered = new Set(registrations.map((registration) => registration.type));
    const types = registrations.map((registration) => registration.type);

    const missingDependencies = this.findMissing(types, registered, edges);
    const cycle = findFirstCycle(types, edges);
    const warnings = [
      ...this.findSharedPriorities(registrations),
      ...this.findUnawareDependents(registrations, edges),
    ];

    return {
      isValid: missingDependencies.length === 0 && cycle.length === 0,
      missingDependencies,
      missingDependencyMessages: missingDependencies.map(
        ({ dependent, dependency }) => new MissingDependencyError(dependent, dependency).message,
      ),
      hasCircularDependencies: cycle.length > 0,
      cycle,
      cycleDescription: cycle.map((type) => getServiceName(type)).join(' -> '),
      warnings,
    };
  }

  private findMissing(
    types: readonly ServiceIdentifier[],
    registered: ReadonlySet<ServiceIdentifier>,
    edges: DependencyEdges,
  ): MissingDependency[] {
    const missing: MissingDependency[] = [];
    for (const dependent of types) {
      for (const dependency of edges.get(dependent) ?? []) {
        if (!registered.has(dependency)) {
          missing.push({ dependent, dependency });
        }
      }
    }
    return missing;
  }

  private findSharedPriorities(registrations: readonly ComponentRegistration[]): string[] {
    const byPriority = new Map<number, string[]>();
    for (const registration of registrations) {
      const names = byPriority.get(registration.priority) ?? [];
      names.push(getServiceName(registration.type));
      byPriority.set(registration.priority, names);
    }

    const warnings: string[] = [];
    for (const [priority, names] of byPriority) {
      if (names.length > 1) {
        warnings.push(`Priority ${priority} is shared by ${names.join(', ')}`);
      }
    }
    return warnings;
  }

  private findUnawareDependents(
    registrations: readonly ComponentRegistration[],
    edges: DependencyEdges,
  ): string[] {
    const warnings: string[] = [];
    for (const registration of registrations) {
      const dependencies = edges.get(registration.type) ?? [];
      if (dependencies.length === 0) {
        continue;
      }

      const aware =
        isDependencyAware(registration.instance) ||
        (isConstructor(registration.type) && isDependencyAware(registration.type.prototype));

      if (!aware) {
        warnings.push(
          `${getServiceName(registration.type)} declares dependencies but does not implement onDependenciesResolved`,
        );
      }
    }
    return warnings;
  }
}
