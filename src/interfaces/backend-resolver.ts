/** Name → backend address lookup. Implemented by the control plane registry. */
export interface BackendResolver {
  /** Returns the registered address for `name`, or undefined when the name is not registered. */
  resolve(name: string): URL | undefined;
}
