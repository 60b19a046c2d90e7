import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { MockAgent } from "undici";
import { HttpError } from "../src/lib/errors.js";
import { httpJson } from "../src/lib/http.js";
import { createMockApi, ORIGIN } from "./helpers/mockApi.js";

describe("httpJson", () => {
  let agent: MockAgent;
  let pool: ReturnType<typeof createMockApi>["pool"];

  beforeEach(() => {
    ({ agent, pool } = createMockApi());
  });

  afterEach(async () => {
    await agent.close();
  });

  it("returns parsed JSON for a 2xx response", async () => {
    pool.intercept({ path: "/thing", method: "GET" }).reply(200, { id: "1", name: "web" });

    const res = await httpJson<{ id: string; name: string }>(`${ORIGIN}/thing`, { dispatcher: agent });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ id: "1", name: "web" });
  });

  it("returns null data for an empty body", async () => {
    pool.intercept({ path: "/thing", method: "DELETE" }).reply(204, "");

    const res = await httpJson(`${ORIGIN}/thing`, { method: "DELETE", dispatcher: agent });

    expect(res.status).toBe(204);
    expect(res.data).toBeNull();
  });

  it("sends a JSON body", async () => {
    let received: unknown;
    pool.intercept({ path: "/thing", method: "POST" }).reply(201, (opts) => {
      received = JSON.parse(String(opts.body));
      return { id: "2" };
    });

    const res = await httpJson<{ id: string }>(`${ORIGIN}/thing`, {
      method: "POST",
      body: { name: "web", cidr: "10.0.0.0/24" },
      dispatcher: agent,
    });

    expect(received).toEqual({ name: "web", cidr: "10.0.0.0/24" });
    expect(res.data).toEqual({ id: "2" });
  });

  it("retries a 429 after Retry-After and then succeeds", async () => {
    pool.intercept({ path: "/thing", method: "GET" }).reply(429, "slow down", { headers: { "retry-after": "0" } });
    pool.intercept({ path: "/thing", method: "GET" }).reply(200, { ok: true });

    const res = await httpJson(`${ORIGIN}/thing`, { retries: 2, backoffBaseMs: 1, dispatcher: agent });

    expect(res.data).toEqual({ ok: true });
    agent.assertNoPendingInterceptors();
  });

  it("retries network errors", async () => {
    pool.intercept({ path: "/thing", method: "GET" }).replyWithError(new Error("socket hang up"));
    pool.intercept({ path: "/thing", method: "GET" }).reply(200, { ok: true });

    const res = await httpJson(`${ORIGIN}/thing`, { retries: 1, backoffBaseMs: 1, dispatcher: agent });

    expect(res.data).toEqual({ ok: true });
  });

  it("throws HttpError without retrying a 4xx", async () => {
    pool.intercept({ path: "/thing", method: "GET" }).reply(400, '{"errors":["bad"]}');

    const err = await httpJson(`${ORIGIN}/thing`, { retries: 3, backoffBaseMs: 1, dispatcher: agent }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 400, url: `${ORIGIN}/thing`, body: '{"errors":["bad"]}' });
  });

  it("gives up on a 5xx once retries are exhausted", async () => {
    pool.intercept({ path: "/thing", method: "GET" }).reply(503, "busy").times(3);

    const err = await httpJson(`${ORIGIN}/thing`, { retries: 2, backoffBaseMs: 1, dispatcher: agent }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 503, body: "busy" });
    agent.assertNoPendingInterceptors();
  });
});
