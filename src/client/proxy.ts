// This module turns property access into JSON-RPC dispatch for ergonomic call sites.

export type RemoteMethods<M> = { [K in keyof M]: (...args: never[]) => unknown };

// Used when no method map is supplied: any name, any positional arguments.
export type DynamicMethods = Record<string, (...args: unknown[]) => unknown>;

export type MethodProxy<M> = {
  [K in keyof M & string]: M[K] extends (...args: infer A) => infer R ? (...args: A) => Promise<Awaited<R>> : never;
};

export type Invoke = (method: string, args: unknown[]) => Promise<unknown>;

/**
 * Builds a proxy whose every string property is a remote method.
 *
 * `then` is never dispatched so awaiting the proxy itself does not fire a
 * request, and symbol keys (inspection, iteration) resolve to `undefined`.
 */
export function createMethodProxy<M extends RemoteMethods<M> = DynamicMethods>(invoke: Invoke): MethodProxy<M> {
  const target: MethodProxy<M> = Object.create(null);

  return new Proxy(target, {
    get(_target, property) {
      if (typeof property !== 'string' || property === 'then') {
        return undefined;
      }

      return (...args: unknown[]) => invoke(property, args);
    }
  });
}
