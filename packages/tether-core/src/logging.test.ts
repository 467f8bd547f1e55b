import { describe, it, expect, vi, afterEach } from "vitest";
import { debugLogf, isEnabled, matchPattern } from "./logging.ts";
import { Extensions } from "./middleware.ts";
import { tracingMiddleware } from "./tracing.ts";
import { ApplicationError } from "./errors.ts";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("matchPattern", () => {
  it("supports wildcards", () => {
    expect(matchPattern("tether:rpc", "*")).toBe(true);
    expect(matchPattern("tether:rpc", "tether:*")).toBe(true);
    expect(matchPattern("tether:rpc", "other:*")).toBe(false);
    expect(matchPattern("tether.rpc", "tether:rpc")).toBe(false);
  });
});

describe("isEnabled", () => {
  it("is off without DEBUG", () => {
    expect(isEnabled("tether:rpc", "")).toBe(false);
  });

  it("applies exclusions after inclusions", () => {
    expect(isEnabled("tether:rpc", "tether:*,-tether:rpc")).toBe(false);
    expect(isEnabled("tether:endpoint", "tether:* -tether:rpc")).toBe(true);
  });

  it("reads DEBUG from the environment", () => {
    vi.stubEnv("DEBUG", "tether:*");
    expect(isEnabled("tether:child")).toBe(true);
  });
});

describe("debugLogf", () => {
  it("prefixes the namespace while enabled", () => {
    const sink = vi.fn();
    const logf = debugLogf("tether:endpoint", sink);

    vi.stubEnv("DEBUG", "");
    logf("dropped %s", "x");
    vi.stubEnv("DEBUG", "tether:endpoint");
    logf("kept %s", "y");

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith("tether:endpoint kept %s", "y");
  });
});

describe("tracingMiddleware", () => {
  const request = { method: "add", args: [1, 2] };

  it("logs the request and a successful outcome", async () => {
    vi.stubEnv("DEBUG", "tether:rpc");
    const logf = vi.fn();
    const mw = tracingMiddleware({ logf });
    const ctx = { extensions: new Extensions() };

    await mw.pre?.(ctx, request);
    await mw.post?.(ctx, request, { ok: true, value: 3 });

    expect(logf).toHaveBeenNthCalledWith(1, "→ %s %o", "add", { type: "request", method: "add", args: [1, 2] });
    expect(logf).toHaveBeenNthCalledWith(2, "← %s: ✓ %s %o", "add", expect.stringMatching(/^\d+\.\d\dms$/), {
      type: "response",
      method: "add",
      duration: expect.stringMatching(/ms$/),
      ok: true,
      result: 3,
    });
  });

  it("logs the kind of an application error", async () => {
    vi.stubEnv("DEBUG", "tether:*");
    const logf = vi.fn();
    const mw = tracingMiddleware({ logf, logArgs: false });
    const ctx = { extensions: new Extensions() };

    await mw.pre?.(ctx, request);
    await mw.post?.(ctx, request, { ok: false, error: new ApplicationError("add", "validation", "bad") });

    expect(logf).toHaveBeenNthCalledWith(1, "→ %s %o", "add", { type: "request", method: "add" });
    expect(logf.mock.calls[1][0]).toBe("← %s: ✗ %s %o");
    expect(logf.mock.calls[1][3]).toMatchObject({ ok: false, errorKind: "validation", error: "bad" });
  });

  it("stays quiet unless its namespace is enabled", async () => {
    vi.stubEnv("DEBUG", "tether:endpoint");
    const logf = vi.fn();
    const mw = tracingMiddleware({ logf });
    const ctx = { extensions: new Extensions() };

    await mw.pre?.(ctx, request);
    await mw.post?.(ctx, request, { ok: true, value: 3 });
    expect(logf).not.toHaveBeenCalled();
  });
});
