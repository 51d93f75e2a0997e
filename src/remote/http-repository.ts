/**
 * HTTP remote repository for a PostgREST-style backend.
 *
 * Rows live under `/rest/v1/<collection>` and are addressed with
 * `?id=eq.<id>` filters.
 */

import type { Entity } from "../lib/types.ts";
import type { RemoteRepository, RemoteResult } from "./types.ts";

export interface HttpRemoteRepositoryOptions {
  baseUrl: string;
  collection: string;
  apiKey?: string;
  /** Returns the user's access token; falls back to the API key. */
  getToken?: () => string | null;
  fetch?: typeof fetch;
}

const TRANSIENT_STATUSES = new Set([401, 408, 425, 429]);

export class HttpRemoteRepository implements RemoteRepository {
  private baseUrl: string;
  private collection: string;
  private apiKey: string | undefined;
  private getToken: () => string | null;
  private fetchImpl: typeof fetch;

  constructor(options: HttpRemoteRepositoryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, ""); // Remove trailing slash
    this.collection = options.collection;
    this.apiKey = options.apiKey;
    this.getToken = options.getToken ?? (() => null);
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async create(entity: Entity): Promise<RemoteResult> {
    const result = await this.request("POST", this.collectionUrl(), entity);
    // Already exists: a replay of a write that landed before we saw the response
    if (result.status === 409) return { ok: true };
    return result.outcome;
  }

  async update(entity: Entity): Promise<RemoteResult> {
    const result = await this.request("PATCH", this.rowUrl(entity.id), entity);
    return result.outcome;
  }

  async delete(id: string): Promise<RemoteResult> {
    const result = await this.request("DELETE", this.rowUrl(id));
    if (result.status === 404) return { ok: true };
    return result.outcome;
  }

  private collectionUrl(): string {
    return `${this.baseUrl}/rest/v1/${encodeURIComponent(this.collection)}`;
  }

  private rowUrl(id: string): string {
    return `${this.collectionUrl()}?id=eq.${encodeURIComponent(id)}`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Prefer: "return=minimal",
    };
    if (this.apiKey) {
      headers.apikey = this.apiKey;
    }
    const token = this.getToken() ?? this.apiKey;
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }

  private async request(
    method: string,
    url: string,
    body?: Entity,
  ): Promise<{ status: number | null; outcome: RemoteResult }> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers(),
        body: body !== undefined ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Network error";
      return { status: null, outcome: { ok: false, kind: "transient", error: message } };
    }

    if (response.ok) {
      return { status: response.status, outcome: { ok: true } };
    }

    const message = await readErrorMessage(response);
    const transient = response.status >= 500 || TRANSIENT_STATUSES.has(response.status);

    return {
      status: response.status,
      outcome: {
        ok: false,
        kind: transient ? "transient" : "permanent",
        error: message,
      },
    };
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `Server error: ${response.status}`;
  try {
    const body: unknown = await response.json();
    if (
      typeof body === "object" &&
      body !== null &&
      "message" in body &&
      typeof body.message === "string" &&
      body.message.length > 0
    ) {
      return body.message;
    }
    return fallback;
  } catch {
    return fallback;
  }
}

/**
 * Build a reachability probe for ConnectivityMonitor: any HTTP response from
 * the backend counts as online.
 */
export function createReachabilityProbe(
  baseUrl: string,
  options: { fetch?: typeof fetch; timeoutMs?: number } = {},
): () => Promise<boolean> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const timeoutMs = options.timeoutMs ?? 5000;
  const url = `${baseUrl.replace(/\/$/, "")}/rest/v1/`;

  return async () => {
    try {
      await fetchImpl(url, {
        method: "HEAD",
        signal: AbortSignal.timeout(timeoutMs),
      });
      return true;
    } catch {
      return false;
    }
  };
}
