import { createHmac, timingSafeEqual } from "node:crypto";

export interface AccessTokenClaims {
  user_id: number;
  email: string;
  exp: number;
}

const TOKEN_HEADER = { alg: "HS256", typ: "JWT" };

export function issueAccessToken(input: {
  secret: string;
  ttlSeconds: number;
  userId: number;
  email: string;
  now?: number;
}): string {
  const now = input.now ?? Math.floor(Date.now() / 1000);
  const claims: AccessTokenClaims = {
    user_id: input.userId,
    email: input.email,
    exp: now + Math.floor(input.ttlSeconds),
  };
  const headerB64 = toBase64Url(JSON.stringify(TOKEN_HEADER));
  const payloadB64 = toBase64Url(JSON.stringify(claims));
  const data = `${headerB64}.${payloadB64}`;
  const signature = createHmac("sha256", input.secret).update(data).digest();
  return `${data}.${toBase64Url(signature)}`;
}

export function verifyAccessToken(
  token: string,
  secret: string,
  now = Math.floor(Date.now() / 1000),
): AccessTokenClaims | null {
  if (!token || typeof token !== "string") {
    return null;
  }
  const parts = token.split(".");
  if (parts.length !== 3) {
    return null;
  }

  const [headerB64, payloadB64, signatureB64] = parts;
  const expectedSig = createHmac("sha256", secret).update(`${headerB64}.${payloadB64}`).digest();
  const providedSig = Buffer.from(signatureB64, "base64url");
  if (!safeEqualBuffer(providedSig, expectedSig)) {
    return null;
  }

  try {
    const header: unknown = JSON.parse(Buffer.from(headerB64, "base64url").toString("utf8"));
    if (!isRecord(header) || header.alg !== "HS256") {
      return null;
    }
    const payload: unknown = JSON.parse(Buffer.from(payloadB64, "base64url").toString("utf8"));
    if (!isRecord(payload)) {
      return null;
    }
    const { user_id: userId, email, exp } = payload;
    if (typeof userId !== "number" || !Number.isInteger(userId)) {
      return null;
    }
    if (typeof email !== "string" || typeof exp !== "number" || !Number.isFinite(exp)) {
      return null;
    }
    if (exp <= now) {
      return null;
    }
    return { user_id: userId, email, exp };
  } catch {
    return null;
  }
}

/** Accepts both "Bearer <token>" and a bare token. */
export function extractBearerToken(headerValue: string | undefined): string | null {
  if (!headerValue) {
    return null;
  }
  // The prefix is optional; a bare "Bearer" carries no token.
  const token = headerValue.trim().replace(/^Bearer(?:\s+|$)/, "").trim();
  return token.length > 0 ? token : null;
}

function safeEqualBuffer(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

function toBase64Url(input: string | Buffer): string {
  return Buffer.from(input).toString("base64url");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
