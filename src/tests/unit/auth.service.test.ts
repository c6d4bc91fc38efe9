import assert from "node:assert/strict";
import { describe, it } from "node:test";
import bcrypt from "bcryptjs";
import { verifyAccessToken } from "../../auth/access-token";
import { AuthService } from "../../auth/auth.service";
import { CandidatesRepository } from "../../db/repositories/candidates.repo";
import { UnauthorizedError } from "../../shared/errors";
import { FakeRestReader, noopLogger } from "../fixtures";

const SECRET = "test-secret";

function buildService(): AuthService {
  const reader = new FakeRestReader({
    candidates: [
      {
        id: 42,
        email: "ada@example.com",
        password_hash: bcrypt.hashSync("test-password", 4),
        name: "Ada",
        education: "Bachelors",
        skills: "Python, React",
        location: "San Francisco",
        experience_years: 2,
        phone: null,
        linkedin: null,
        github: "ada-dev",
      },
    ],
  });
  return new AuthService(
    new CandidatesRepository(noopLogger, reader),
    { jwtSecret: SECRET, tokenTtlHours: 24 },
    noopLogger,
  );
}

describe("AuthService", () => {
  it("logs in with valid credentials and hides the password hash", async () => {
    const response = await buildService().login("ada@example.com", "test-password");

    assert.equal(response.success, true);
    assert.equal(response.message, "Login successful");
    assert.deepEqual(response.user, {
      id: 42,
      email: "ada@example.com",
      name: "Ada",
      education: "Bachelors",
      skills: "Python, React",
      location: "San Francisco",
      experience_years: 2,
      phone: null,
      linkedin: null,
      github: "ada-dev",
    });
    const claims = verifyAccessToken(response.token, SECRET);
    assert.equal(claims?.user_id, 42);
    assert.equal(claims?.email, "ada@example.com");
  });

  it("issues tokens valid for the configured number of hours", async () => {
    const before = Math.floor(Date.now() / 1000);
    const response = await buildService().login("ada@example.com", "test-password");
    const claims = verifyAccessToken(response.token, SECRET);

    assert.ok(claims);
    assert.ok(claims.exp >= before + 24 * 3600);
    assert.ok(claims.exp <= Math.floor(Date.now() / 1000) + 24 * 3600);
  });

  it("rejects a wrong password", async () => {
    await assert.rejects(buildService().login("ada@example.com", "wrong"), UnauthorizedError);
  });

  it("rejects an unknown email", async () => {
    await assert.rejects(buildService().login("nobody@example.com", "test-password"), UnauthorizedError);
  });

  it("refreshes a valid bearer token", async () => {
    const service = buildService();
    const { token } = await service.login("ada@example.com", "test-password");

    const refreshed = await service.refreshToken(`Bearer ${token}`);
    assert.equal(refreshed.message, "Token refreshed successfully");
    assert.equal(verifyAccessToken(refreshed.token, SECRET)?.user_id, 42);
  });

  it("rejects refresh without a token", async () => {
    await assert.rejects(buildService().refreshToken(undefined), UnauthorizedError);
  });

  it("resolves the user id from an authorization header", async () => {
    const service = buildService();
    const { token } = await service.login("ada@example.com", "test-password");

    assert.equal(service.verifyAuthorization(`Bearer ${token}`), 42);
    assert.throws(() => service.verifyAuthorization("Bearer garbage"), UnauthorizedError);
  });
});
