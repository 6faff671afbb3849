/**
 * Credential resolution
 *
 * Decides which Sokosumi API key a tool call runs with.
 *
 * - PerCallCredentialResolver (HTTP / multi-tenant): the key travels with the
 *   call as `Authorization: Bearer <key>`, either as an HTTP header or in the
 *   call's `_meta`. Nothing is remembered between calls.
 * - ProcessCredentialResolver (stdio / single-tenant): the key lives in a
 *   CredentialCell set from the environment or by the `configure` tool.
 */

import { MissingCredentialError } from "../api/types.js";

const BEARER_PREFIX = "Bearer ";

/**
 * What a tool call carries with it that may hold a credential.
 */
export interface CallContext {
  /** Headers of the inbound HTTP request, when the transport has any */
  headers?: Record<string, string | string[] | undefined>;
  /** The `_meta` object of the tools/call request */
  meta?: unknown;
}

export interface CredentialResolver {
  /**
   * @throws MissingCredentialError when no credential can be determined
   */
  resolve(context: CallContext): string;
  /** Whether a credential is available without any call context */
  isConfigured(): boolean;
}

/**
 * Strip the `Bearer ` prefix (case-sensitive, one space). Anything else,
 * including a bare token or an empty one, yields undefined.
 */
export function parseBearerToken(value: string | undefined): string | undefined {
  if (!value || !value.startsWith(BEARER_PREFIX)) {
    return undefined;
  }
  const token = value.substring(BEARER_PREFIX.length);
  return token || undefined;
}

// ==========================================
// Per-call extraction strategies
// ==========================================

export interface CredentialStrategy {
  name: string;
  /** Raw Authorization value from this carrier, if present */
  extract(context: CallContext): string | undefined;
}

export const requestHeaderStrategy: CredentialStrategy = {
  name: "request-header",
  extract(context) {
    if (!context.headers) {
      return undefined;
    }
    for (const [key, value] of Object.entries(context.headers)) {
      if (key.toLowerCase() !== "authorization") {
        continue;
      }
      return Array.isArray(value) ? value[0] : value;
    }
    return undefined;
  },
};

export const requestMetaStrategy: CredentialStrategy = {
  name: "request-meta",
  extract(context) {
    const meta = context.meta;
    if (typeof meta !== "object" || meta === null || !("authorization" in meta)) {
      return undefined;
    }
    return typeof meta.authorization === "string" ? meta.authorization : undefined;
  },
};

export const DEFAULT_CREDENTIAL_STRATEGIES: readonly CredentialStrategy[] = [
  requestHeaderStrategy,
  requestMetaStrategy,
];

export class PerCallCredentialResolver implements CredentialResolver {
  private strategies: readonly CredentialStrategy[];

  constructor(strategies: readonly CredentialStrategy[] = DEFAULT_CREDENTIAL_STRATEGIES) {
    this.strategies = strategies;
  }

  resolve(context: CallContext): string {
    // A malformed value in one carrier does not stop the next one from being tried
    for (const strategy of this.strategies) {
      const token = parseBearerToken(strategy.extract(context));
      if (token) {
        return token;
      }
    }
    throw new MissingCredentialError(
      "API key required in Authorization header (format: 'Bearer YOUR_API_KEY')"
    );
  }

  isConfigured(): boolean {
    return false;
  }
}

// ==========================================
// Process-wide credential
// ==========================================

/**
 * Holds the single-tenant API key. Last write wins; a call reads the value
 * once when it resolves its credential.
 */
export class CredentialCell {
  private value: string | null;

  constructor(initial: string | null = null) {
    this.value = initial || null;
  }

  get(): string | null {
    return this.value;
  }

  set(value: string): void {
    this.value = value;
  }

  isConfigured(): boolean {
    return this.value !== null;
  }
}

export class ProcessCredentialResolver implements CredentialResolver {
  constructor(private readonly cell: CredentialCell) {}

  resolve(_context: CallContext): string {
    const value = this.cell.get();
    if (!value) {
      throw new MissingCredentialError(
        "No API key configured. Set SOKOSUMI_API_KEY or call the configure tool."
      );
    }
    return value;
  }

  isConfigured(): boolean {
    return this.cell.isConfigured();
  }
}
