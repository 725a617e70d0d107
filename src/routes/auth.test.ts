import http from "node:http";
import pino from "pino";
import { z } from "zod";
import { afterEach, describe, expect, it } from "vitest";

import { buildExpressApp } from "../app";
import { storeUnavailable } from "../auth/errors";
import { createAuthCore } from "../auth/index";
import { MemoryCredentialStore } from "../auth/memoryCredentialStore";
import { loadEnv } from "../config/env";
import type { MailResult, Mailer, VerificationEmailPayload } from "../mailer/resend";
import type { CounterStore, WindowCount } from "../redis/kvStore";
import { MemoryKeyValueStore } from "../redis/memoryStore";

const pairSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal("bearer"),
});

class CapturingMailer implements Mailer {
  readonly links: string[] = [];

  async sendVerificationEmail({ link }: VerificationEmailPayload): Promise<MailResult> {
    this.links.push(link);
    return { success: true };
  }

  lastPath(): string {
    const link = this.links[this.links.length - 1];
    if (!link) throw new Error("no verification email was sent");
    return new URL(link).pathname;
  }
}

class DownCounters implements CounterStore {
  async incrementWindow(): Promise<WindowCount> {
    throw storeUnavailable(new Error("ECONNREFUSED"));
  }
}

interface Reply {
  status: number;
  headers: Headers;
  body: unknown;
}

interface CallOptions {
  body?: unknown;
  token?: string;
  cookie?: string;
}

type Harness = {
  mailer: CapturingMailer;
  call(method: string, path: string, opts?: CallOptions): Promise<Reply>;
};

const servers: http.Server[] = [];

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve())))
  );
});

async function startServer(overrides: Record<string, string> = {}, counters?: CounterStore): Promise<Harness> {
  const env = loadEnv({ JWT_SECRET: "test-secret", BCRYPT_ROUNDS: "4", ...overrides });
  const logger = pino({ level: "silent" });
  const kv = new MemoryKeyValueStore();
  const mailer = new CapturingMailer();
  const core = createAuthCore(env, {
    store: new MemoryCredentialStore(),
    counters: counters ?? kv,
    cache: kv,
    mailer,
    logger,
  });
  const app = buildExpressApp({
    auth: core.auth,
    limiter: core.limiter,
    logger,
    refreshCookieName: env.REFRESH_COOKIE_NAME,
    refreshCookieMaxAgeMs: 7 * 24 * 60 * 60 * 1000,
    secureCookies: false,
    requestLogging: false,
  });

  const server = http.createServer(app);
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a TCP port");
  const base = `http://127.0.0.1:${address.port}`;

  return {
    mailer,
    async call(method, path, opts = {}) {
      const headers: Record<string, string> = {};
      if (opts.body !== undefined) headers["content-type"] = "application/json";
      if (opts.token) headers.authorization = `Bearer ${opts.token}`;
      if (opts.cookie) headers.cookie = opts.cookie;
      const res = await fetch(`${base}${path}`, {
        method,
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      });
      const text = await res.text();
      return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : null };
    },
  };
}

const signup = { email: "user@example.com", name: "Test User", password: "secret123" };
const credentials = { email: signup.email, password: signup.password };

describe("auth routes", () => {
  it("walks a user through register, verify, login, me, refresh and logout", async () => {
    const { call, mailer } = await startServer();

    const registered = await call("POST", "/api/auth/register", { body: signup });
    expect(registered.status).toBe(201);
    expect(registered.body).toMatchObject({
      user: { email: "user@example.com", name: "Test User", isVerified: false },
      detail: "User successfully created. Check your email for confirmation.",
    });

    const early = await call("POST", "/api/auth/login", { body: credentials });
    expect(early.status).toBe(403);
    expect(early.body).toEqual({ error: { code: "EmailNotVerified", message: "Email not confirmed" } });

    const verified = await call("GET", mailer.lastPath());
    expect(verified.status).toBe(200);
    expect(verified.body).toEqual({ message: "Email confirmed" });
    expect((await call("GET", mailer.lastPath())).body).toEqual({ message: "Your email is already confirmed" });

    const login = await call("POST", "/api/auth/login", { body: credentials });
    expect(login.status).toBe(200);
    const pair = pairSchema.parse(login.body);
    expect(login.headers.get("set-cookie")).toContain(`rt=${pair.refreshToken};`);

    const me = await call("GET", "/api/auth/me", { token: pair.accessToken });
    expect(me.status).toBe(200);
    expect(me.body).toMatchObject({ user: { email: "user@example.com", name: "Test User", isVerified: true } });

    const refreshed = await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.refreshToken } });
    expect(refreshed.status).toBe(200);
    const next = pairSchema.parse(refreshed.body);

    const replay = await call("POST", "/api/auth/refresh", { body: { refreshToken: pair.refreshToken } });
    expect(replay.status).toBe(401);
    expect(replay.body).toMatchObject({ error: { code: "RefreshReuseDetected" } });
    expect(replay.headers.get("set-cookie")).toContain("rt=;");

    const logout = await call("POST", "/api/auth/logout", { token: next.accessToken });
    expect(logout.status).toBe(204);
    expect(logout.body).toBeNull();
  });

  it("refreshes from the cookie when the body carries no token", async () => {
    const { call, mailer } = await startServer();
    await call("POST", "/api/auth/register", { body: signup });
    await call("GET", mailer.lastPath());
    const pair = pairSchema.parse((await call("POST", "/api/auth/login", { body: credentials })).body);

    const refreshed = await call("POST", "/api/auth/refresh", { cookie: `rt=${pair.refreshToken}` });

    expect(refreshed.status).toBe(200);
    expect(pairSchema.safeParse(refreshed.body).success).toBe(true);
  });

  it("answers 401 without any refresh token", async () => {
    const { call } = await startServer();

    const res = await call("POST", "/api/auth/refresh", { body: {} });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: { code: "Unauthorized", message: "Missing refresh token" } });
  });

  it("guards /me with a bearer token", async () => {
    const { call } = await startServer();

    expect((await call("GET", "/api/auth/me")).body).toEqual({
      error: { code: "Unauthorized", message: "Missing token" },
    });
    const bad = await call("GET", "/api/auth/me", { token: "not-a-token" });
    expect(bad.status).toBe(401);
    expect(bad.body).toEqual({ error: { code: "Unauthorized", message: "Invalid or expired token" } });
  });

  it("rejects invalid bodies with 400", async () => {
    const { call } = await startServer();

    const res = await call("POST", "/api/auth/register", { body: { email: "nope", name: "", password: "short" } });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "ValidationFailed", message: "Invalid input" } });
  });

  it("answers duplicate registration with 409", async () => {
    const { call } = await startServer();
    await call("POST", "/api/auth/register", { body: signup });

    const res = await call("POST", "/api/auth/register", { body: { ...signup, email: "USER@example.com" } });

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { code: "EmailTaken" } });
  });

  it("resends verification through request-email", async () => {
    const { call, mailer } = await startServer();
    await call("POST", "/api/auth/register", { body: signup });

    const res = await call("POST", "/api/auth/request-email", { body: { email: signup.email } });

    expect(res.body).toEqual({ message: "Check your email for confirmation." });
    expect(mailer.links).toHaveLength(2);
  });

  it("limits the credential endpoints per client", async () => {
    const { call } = await startServer({ AUTH_RATE_LIMIT_MAX: "2" });

    const first = await call("POST", "/api/auth/login", { body: { email: "a@example.com", password: "x" } });
    expect(first.headers.get("x-ratelimit-limit")).toBe("2");
    expect(first.headers.get("x-ratelimit-remaining")).toBe("1");
    await call("POST", "/api/auth/login", { body: { email: "a@example.com", password: "x" } });

    const limited = await call("POST", "/api/auth/login", { body: { email: "a@example.com", password: "x" } });
    expect(limited.status).toBe(429);
    expect(limited.headers.get("retry-after")).toBe("60");
    expect(limited.headers.get("x-ratelimit-remaining")).toBe("0");
    expect(limited.body).toEqual({ error: { code: "RateLimited", message: "Too many requests. Please slow down." } });
  });

  it("fails closed on credential endpoints when the counter store is down", async () => {
    const { call } = await startServer({}, new DownCounters());

    const res = await call("POST", "/api/auth/login", { body: credentials });

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: { code: "StoreUnavailable", message: "Auth service unavailable" } });
  });

  it("serves the health check and a JSON 404", async () => {
    const { call } = await startServer();

    expect((await call("GET", "/api/healthchecker")).body).toEqual({ message: "Server alive." });
    const missing = await call("GET", "/api/nowhere");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: { code: "NotFound", message: "Route GET /api/nowhere not found" } });
  });
});
