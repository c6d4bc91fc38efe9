import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { loadEnv } from "../../config/env";

describe("loadEnv", () => {
  it("applies defaults for development", () => {
    const env = loadEnv({ NODE_ENV: "development" });

    assert.equal(env.port, 3001);
    assert.equal(env.logLevel, "info");
    assert.equal(env.debugMode, false);
    assert.equal(env.jwtTtlHours, 24);
    assert.equal(env.upstreamApiUrl, "http://localhost:8000");
    assert.equal(env.recommendationsDefaultLimit, 5);
    assert.equal(env.trendingSkillsDefaultLimit, 10);
    assert.equal(env.supabaseUrl, undefined);
    assert.ok(env.jwtSecret.length > 0);
  });

  it("reads explicit values", () => {
    const env = loadEnv({
      NODE_ENV: "production",
      PORT: "8080",
      JWT_SECRET_KEY: "test-secret",
      SUPABASE_URL: "https://db.example.test",
      SUPABASE_PUBLISHABLE_KEY: "test-key",
      UPSTREAM_API_URL: "http://upstream.example.test/",
      DEBUG_MODE: "yes",
    });

    assert.equal(env.port, 8080);
    assert.equal(env.jwtSecret, "test-secret");
    assert.equal(env.supabaseApiKey, "test-key");
    assert.equal(env.upstreamApiUrl, "http://upstream.example.test");
    assert.equal(env.debugMode, true);
    assert.equal(env.logLevel, "debug");
  });

  it("requires a JWT secret in production", () => {
    assert.throws(() => loadEnv({ NODE_ENV: "production" }), /JWT_SECRET_KEY/);
  });

  it("rejects invalid numbers and flags", () => {
    assert.throws(() => loadEnv({ PORT: "abc" }), /Invalid PORT value: abc/);
    assert.throws(() => loadEnv({ RECOMMENDATIONS_DEFAULT_LIMIT: "-1" }), /RECOMMENDATIONS_DEFAULT_LIMIT/);
    assert.throws(() => loadEnv({ DEBUG_MODE: "maybe" }), /Invalid boolean value: maybe/);
    assert.throws(() => loadEnv({ LOG_LEVEL: "verbose" }), /Invalid LOG_LEVEL value: verbose/);
  });
});
