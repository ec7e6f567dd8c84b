import { InvalidIdError } from '../errors';

/**
 * Separator placed between namespaces and the raw id.
 *
 * Example:
 *   resolveId('readings', ['north'])          // 'north-readings'
 *   resolveId('readings', ['page', 'north'])  // 'page-north-readings'
 */
export const NAMESPACE_SEPARATOR = '-';

const WHITESPACE = /\s/;

function assertValidId(id: string): void {
  if (id.length === 0) {
    throw new InvalidIdError(id, 'ids must not be empty');
  }
  if (WHITESPACE.test(id)) {
    throw new InvalidIdError(id, 'ids must not contain whitespace');
  }
}

/**
 * Resolves a raw id against a namespace stack.
 *
 * Pure: the same `rawId` and `scopeStack` always yield the same id, and the
 * same `rawId` under a non-empty stack never equals its top-level form.
 */
export function resolveId(
  rawId: string,
  scopeStack: ReadonlyArray<string>
): string {
  assertValidId(rawId);
  return [...scopeStack, rawId].join(NAMESPACE_SEPARATOR);
}

/**
 * Immutable namespace stack of one point in the UI (or server) composition.
 *
 * Push is `child(namespace)`; pop is simply going back to the parent value, so
 * no ambient state is involved and two sibling compositions cannot leak
 * namespaces into one another.
 */
export class Scope {
  readonly namespaces: ReadonlyArray<string>;

  constructor(namespaces: ReadonlyArray<string> = []) {
    namespaces.forEach(assertValidId);
    this.namespaces = Object.freeze([...namespaces]);
  }

  resolve(rawId: string): string {
    return resolveId(rawId, this.namespaces);
  }

  child(namespace: string): Scope {
    return new Scope([...this.namespaces, namespace]);
  }
}

export const rootScope = new Scope();

/**
 * Runs `build` inside a nested composition.
 *
 * Mirrors a module boundary in the UI: the callback receives the pushed scope
 * and whatever it returns is handed back unchanged. Once it returns, the
 * caller keeps using its own (popped) scope.
 *
 *   withNamespace(rootScope, 'north', scope =>
 *     tableOutput.uiFactory(scope, 'readings')   // id: 'north-readings'
 *   )
 */
export function withNamespace<Output>(
  scope: Scope,
  namespace: string,
  build: (scope: Scope) => Output
): Output {
  return build(scope.child(namespace));
}
