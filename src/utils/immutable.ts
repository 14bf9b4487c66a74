import { IllegalMutationError } from "../errors";

/**
 * Freezes `target` and wraps it so that any external write (assignment,
 * deletion, property definition, prototype change) throws
 * {@link IllegalMutationError} instead of a bare TypeError.
 */
export function immutable<T extends object>(target: T, label: string): T {
  Object.freeze(target);

  const reject = (action: string, key?: PropertyKey): never => {
    const where = key === undefined ? "" : ` ${String(key)}`;
    throw new IllegalMutationError(`${label} is immutable: cannot ${action}${where}`, key);
  };

  return new Proxy(target, {
    set: (_t, key) => reject("assign", key),
    deleteProperty: (_t, key) => reject("delete", key),
    defineProperty: (_t, key) => reject("define", key),
    setPrototypeOf: () => reject("change the prototype of it"),
  });
}
