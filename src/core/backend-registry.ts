/**
 * BackendRegistry: in-memory control plane: backend name → address.
 *
 * The data plane reads it only through `resolve`, once per connect. Entries are
 * not persisted across restarts.
 *
 * @module ControlPlane
 */

import { NameConflictError, NameNotFoundError } from "../errors.js";
import type { BackendResolver } from "../interfaces/backend-resolver.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface Registration {
  name: string;
  backendAddress: URL;
  meta: Record<string, unknown>;
  registeredAt: string;
}

export interface BackendRegistryEvents {
  registered: { registration: Registration };
  unregistered: { name: string };
}

export class BackendRegistry
  extends TypedEventEmitter<BackendRegistryEvents>
  implements BackendResolver
{
  private readonly entries = new Map<string, Registration>();

  constructor(private readonly now: () => Date = () => new Date()) {
    super();
  }

  /** Register `name`. Throws NameConflictError when the name is taken. */
  register(name: string, baseUrl: string | URL, meta: Record<string, unknown> = {}): Registration {
    if (this.entries.has(name)) throw new NameConflictError(name);
    const registration: Registration = {
      name,
      backendAddress: normalizeBaseUrl(baseUrl),
      meta,
      registeredAt: this.now().toISOString(),
    };
    this.entries.set(name, registration);
    this.emit("registered", { registration });
    return registration;
  }

  /** Remove `name`. Throws NameNotFoundError when it is not registered. */
  unregister(name: string): void {
    if (!this.entries.delete(name)) throw new NameNotFoundError(name);
    this.emit("unregistered", { name });
  }

  resolve(name: string): URL | undefined {
    const entry = this.entries.get(name);
    return entry ? new URL(entry.backendAddress.href) : undefined;
  }

  list(): Registration[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Strip trailing slashes so `{base}/stream` joins cleanly. */
function normalizeBaseUrl(baseUrl: string | URL): URL {
  const url = new URL(typeof baseUrl === "string" ? baseUrl : baseUrl.href);
  url.pathname = url.pathname.replace(/\/+$/, "");
  url.search = "";
  url.hash = "";
  return url;
}
