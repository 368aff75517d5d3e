/**
 * HS256 bearer tokens
 *
 * Claims: `sub` (user id), `iat`, `exp` (seconds). The role is not in the
 * token; it is read from the account on every request, so a role change
 * applies at once.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SignJWT, errors, jwtVerify } from "jose";

const ALGORITHM = "HS256";

const ClaimsSchema = Type.Object({
  sub: Type.String({ minLength: 1 }),
  iat: Type.Optional(Type.Number()),
  exp: Type.Number(),
});

export type AccessTokenClaims = Static<typeof ClaimsSchema>;

const DEFAULT_TOKEN_TTL_SECONDS = 30 * 60;

export class TokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenError";
  }
}

function toKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

function describeJoseError(error: errors.JOSEError): string {
  if (error instanceof errors.JWTExpired) {
    return "token expired";
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return "invalid token signature";
  }
  if (error instanceof errors.JOSEAlgNotAllowed) {
    return "unsupported token algorithm";
  }
  if (error instanceof errors.JWTClaimValidationFailed) {
    return "invalid token claims";
  }
  return "malformed token";
}

export async function signAccessToken(
  subject: string,
  secret: string,
  options: { ttlSeconds?: number; now?: Date } = {}
): Promise<string> {
  const issuedAt = Math.floor((options.now ?? new Date()).getTime() / 1000);

  return new SignJWT({})
    .setProtectedHeader({ alg: ALGORITHM, typ: "JWT" })
    .setSubject(subject)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + (options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS))
    .sign(toKey(secret));
}

/**
 * Verify signature and expiry; rejects with TokenError when the token is
 * unusable
 */
export async function verifyAccessToken(
  token: string,
  secret: string,
  now: Date = new Date()
): Promise<AccessTokenClaims> {
  let payload: unknown;
  try {
    ({ payload } = await jwtVerify(token, toKey(secret), {
      algorithms: [ALGORITHM],
      requiredClaims: ["sub", "exp"],
      currentDate: now,
    }));
  } catch (error) {
    if (error instanceof errors.JOSEError) {
      throw new TokenError(describeJoseError(error));
    }
    throw error;
  }

  if (!Value.Check(ClaimsSchema, payload)) {
    throw new TokenError("invalid token claims");
  }
  return payload;
}
