/**
 * Tests for HttpRemoteRepository.
 */

import { describe, expect, test } from "vitest";
import {
  HttpRemoteRepository,
  createReachabilityProbe,
} from "../src/remote/http-repository.ts";
import { createExpense, createMockFetch } from "./helpers/test-utils.ts";

const BASE_URL = "http://remote.test/";

interface CapturedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function createRepository(
  status: number,
  options: { body?: unknown; getToken?: () => string | null } = {},
): { repository: HttpRemoteRepository; requests: CapturedRequest[] } {
  const requests: CapturedRequest[] = [];
  const fetch = createMockFetch({
    "*": (url, init) => {
      requests.push({
        url,
        method: init.method ?? "GET",
        headers: new Headers(init.headers),
        body: typeof init.body === "string" ? JSON.parse(init.body) : null,
      });
      return { status, body: options.body };
    },
  });

  const repository = new HttpRemoteRepository({
    baseUrl: BASE_URL,
    collection: "expenses",
    apiKey: "test-api-key",
    getToken: options.getToken,
    fetch,
  });
  return { repository, requests };
}

describe("HttpRemoteRepository", () => {
  describe("requests", () => {
    test("create POSTs the entity to the collection", async () => {
      const { repository, requests } = createRepository(201);
      const expense = createExpense();

      const result = await repository.create(expense);

      expect(result).toEqual({ ok: true });
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe("POST");
      expect(requests[0].url).toBe("http://remote.test/rest/v1/expenses");
      expect(requests[0].body).toEqual(expense);
    });

    test("update PATCHes the row by ID", async () => {
      const { repository, requests } = createRepository(204);

      await repository.update(createExpense({ id: "exp 2" }));

      expect(requests[0].method).toBe("PATCH");
      expect(requests[0].url).toBe("http://remote.test/rest/v1/expenses?id=eq.exp%202");
    });

    test("delete sends no body", async () => {
      const { repository, requests } = createRepository(204);

      await repository.delete("exp-1");

      expect(requests[0].method).toBe("DELETE");
      expect(requests[0].url).toBe("http://remote.test/rest/v1/expenses?id=eq.exp-1");
      expect(requests[0].body).toBeNull();
    });

    test("sends the API key as apikey and bearer token", async () => {
      const { repository, requests } = createRepository(201);

      await repository.create(createExpense());

      expect(requests[0].headers.get("apikey")).toBe("test-api-key");
      expect(requests[0].headers.get("authorization")).toBe("Bearer test-api-key");
      expect(requests[0].headers.get("prefer")).toBe("return=minimal");
    });

    test("prefers the user token for authorization", async () => {
      const { repository, requests } = createRepository(201, {
        getToken: () => "test-user-token",
      });

      await repository.create(createExpense());

      expect(requests[0].headers.get("apikey")).toBe("test-api-key");
      expect(requests[0].headers.get("authorization")).toBe("Bearer test-user-token");
    });
  });

  describe("classification", () => {
    test("409 on create counts as success", async () => {
      const { repository } = createRepository(409, { body: { message: "duplicate key" } });

      expect(await repository.create(createExpense())).toEqual({ ok: true });
    });

    test("409 on update is permanent", async () => {
      const { repository } = createRepository(409, { body: { message: "conflict" } });

      expect(await repository.update(createExpense())).toEqual({
        ok: false,
        kind: "permanent",
        error: "conflict",
      });
    });

    test("404 on delete counts as success", async () => {
      const { repository } = createRepository(404);

      expect(await repository.delete("exp-1")).toEqual({ ok: true });
    });

    test("400 is permanent and carries the server message", async () => {
      const { repository } = createRepository(400, {
        body: { message: 'new row violates check constraint "amount_positive"' },
      });

      expect(await repository.create(createExpense())).toEqual({
        ok: false,
        kind: "permanent",
        error: 'new row violates check constraint "amount_positive"',
      });
    });

    test.each([401, 408, 425, 429, 500, 503])("%i is transient", async (status) => {
      const { repository } = createRepository(status);

      expect(await repository.update(createExpense())).toEqual({
        ok: false,
        kind: "transient",
        error: `Server error: ${status}`,
      });
    });

    test("a network failure is transient", async () => {
      const repository = new HttpRemoteRepository({
        baseUrl: BASE_URL,
        collection: "expenses",
        fetch: async () => {
          throw new TypeError("fetch failed");
        },
      });

      expect(await repository.create(createExpense())).toEqual({
        ok: false,
        kind: "transient",
        error: "fetch failed",
      });
    });
  });
});

describe("createReachabilityProbe()", () => {
  test("any response counts as reachable", async () => {
    const urls: string[] = [];
    const probe = createReachabilityProbe(BASE_URL, {
      fetch: createMockFetch({
        "*": (url, init) => {
          urls.push(`${init.method} ${url}`);
          return { status: 401 };
        },
      }),
    });

    expect(await probe()).toBe(true);
    expect(urls).toEqual(["HEAD http://remote.test/rest/v1/"]);
  });

  test("a failed request counts as unreachable", async () => {
    const probe = createReachabilityProbe(BASE_URL, {
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });

    expect(await probe()).toBe(false);
  });
});
