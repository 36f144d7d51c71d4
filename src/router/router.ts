/**
 * DOGE Provider — Request Router
 *
 * Single entry point for page requests. Resolves the method name (direct or
 * alias), enforces the origin's connection, validates params, dispatches.
 *
 * Much route. Very gate. Wow. 🐕
 */

import { Value } from "@sinclair/typebox/value";
import { InvalidParamsError, NotConnectedError, UnsupportedMethodError } from "../errors.js";
import {
  METHOD_ALIASES,
  RequestSchema,
  createMethodTable,
  type MethodHandler,
  type MethodName,
  type MethodResults,
  type MethodTable,
  type ProviderOperations,
} from "./methods.js";
import type { PermissionStore } from "../permissions/store.js";
import type { LogFn, PageContext } from "../types.js";

export class RequestRouter {
  private readonly table: MethodTable;
  private readonly names: Map<string, MethodName>;
  private readonly permissions: PermissionStore;
  private readonly log: LogFn;

  constructor(ops: ProviderOperations, permissions: PermissionStore, log?: LogFn) {
    this.table = createMethodTable(ops);
    this.permissions = permissions;
    this.log = log ?? (() => {});

    this.names = new Map<string, MethodName>();
    for (const handler of Object.values(this.table)) {
      this.names.set(handler.name, handler.name);
    }
    for (const [alias, target] of Object.entries(METHOD_ALIASES)) {
      this.names.set(alias, target);
    }
  }

  /**
   * Map a direct name or alias to its method.
   *
   * @throws UnsupportedMethodError for anything else
   */
  resolve(method: string): MethodName {
    const name = this.names.get(method);
    if (!name) {
      this.log("warn", `doge-provider: unsupported method "${method}"`);
      throw new UnsupportedMethodError(method);
    }
    return name;
  }

  /** Typed dispatch used by the direct page methods */
  async call<K extends MethodName>(ctx: PageContext, name: K, params?: unknown): Promise<MethodResults[K]> {
    const handler: MethodHandler<MethodResults[K]> = this.table[name];
    if (handler.requiresConnection && !this.permissions.isConnected(ctx.origin)) {
      throw new NotConnectedError();
    }
    return handler.invoke(ctx, params);
  }

  /**
   * Generic `request({ method, params })` indirection.
   */
  async request(ctx: PageContext, args: unknown): Promise<unknown> {
    if (!Value.Check(RequestSchema, args)) {
      throw new InvalidParamsError("request", "expected { method: string, params?: object }");
    }
    return this.call(ctx, this.resolve(args.method), args.params);
  }

  /** Every accepted method name, aliases included */
  supportedMethods(): string[] {
    return Array.from(this.names.keys());
  }
}
