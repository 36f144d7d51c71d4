/**
 * DOGE Provider — Per-Origin Permission Store
 *
 * Process-wide record of which page origins the user connected. An origin
 * is either fully connected (it sees the active account) or has no record
 * at all; there are no partial or wildcard grants.
 *
 * Starts empty. Cleared by explicit revocation or wallet lock. When a data
 * directory is given, grants are written through to disk so they survive
 * restarts of the host.
 *
 * Much grant. Very origin. Wow. 🐕
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { secureWriteFile } from "../secure-fs.js";
import { errorMessage } from "../errors.js";
import type { LogFn } from "../types.js";

export interface OriginPermission {
  origin: string;
  granted: true;
  /** Addresses visible to the origin, active account first */
  addresses: string[];
  /** ISO 8601 */
  grantedAt: string;
}

interface PermissionState {
  version: 1;
  grants: OriginPermission[];
}

export class PermissionStore {
  private readonly filePath: string | null;
  private readonly log: LogFn;
  private grants: Map<string, OriginPermission> = new Map();
  private writes: Promise<void> = Promise.resolve();

  constructor(dataDir: string | null = null, log?: LogFn) {
    this.filePath = dataDir ? join(dataDir, "permissions.json") : null;
    this.log = log ?? (() => {});
  }

  isConnected(origin: string): boolean {
    return this.grants.has(origin);
  }

  /**
   * Connect an origin. Re-granting replaces the previous record.
   */
  grant(origin: string, addresses: string[]): OriginPermission {
    const entry: OriginPermission = {
      origin,
      granted: true,
      addresses: [...addresses],
      grantedAt: new Date().toISOString(),
    };
    this.grants.set(origin, entry);
    this.persist();
    this.log("info", `doge-provider: granted ${origin}`);
    return { ...entry, addresses: [...entry.addresses] };
  }

  /**
   * Disconnect an origin immediately and totally.
   *
   * @returns true if the origin had a grant
   */
  revoke(origin: string): boolean {
    const existed = this.grants.delete(origin);
    if (existed) {
      this.persist();
      this.log("info", `doge-provider: revoked ${origin}`);
    }
    return existed;
  }

  connectedAddresses(origin: string): string[] {
    return [...(this.grants.get(origin)?.addresses ?? [])];
  }

  get(origin: string): OriginPermission | undefined {
    const entry = this.grants.get(origin);
    return entry ? { ...entry, addresses: [...entry.addresses] } : undefined;
  }

  connectedOrigins(): string[] {
    return Array.from(this.grants.keys());
  }

  /**
   * Point every grant at a new active account (after an account switch).
   */
  retarget(addresses: string[]): void {
    if (this.grants.size === 0) return;
    for (const entry of this.grants.values()) {
      entry.addresses = [...addresses];
    }
    this.persist();
  }

  /**
   * Drop every grant (wallet lock).
   *
   * @returns the origins that were connected
   */
  clear(): string[] {
    const origins = this.connectedOrigins();
    this.grants.clear();
    if (origins.length > 0) {
      this.persist();
      this.log("info", `doge-provider: cleared ${origins.length} grant(s)`);
    }
    return origins;
  }

  /** Resolves once every pending write has landed */
  flush(): Promise<void> {
    return this.writes;
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  async load(): Promise<void> {
    if (!this.filePath) return;
    try {
      const raw = await readFile(this.filePath, "utf-8");
      const state = JSON.parse(raw) as PermissionState;

      if (state.version !== 1 || !Array.isArray(state.grants)) {
        this.log("warn", "doge-provider: invalid permission state, starting fresh");
        return;
      }

      this.grants.clear();
      for (const entry of state.grants) {
        if (typeof entry.origin === "string" && Array.isArray(entry.addresses)) {
          this.grants.set(entry.origin, { ...entry, granted: true });
        }
      }
      this.log("info", `doge-provider: loaded ${this.grants.size} grant(s)`);
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
      this.log("warn", `doge-provider: permission state read failed: ${errorMessage(err)}`);
    }
  }

  private persist(): void {
    const filePath = this.filePath;
    if (!filePath) return;
    const state: PermissionState = {
      version: 1,
      grants: Array.from(this.grants.values()),
    };
    const data = JSON.stringify(state, null, 2);

    this.writes = this.writes.then(async () => {
      try {
        await secureWriteFile(filePath, data);
      } catch (err: unknown) {
        this.log("error", `doge-provider: permission state write failed: ${errorMessage(err)}`);
      }
    });
  }
}
