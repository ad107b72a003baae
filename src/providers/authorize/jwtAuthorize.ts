import { UnauthorizedException } from "@nestjs/common";
import jwt from "jsonwebtoken";

import { MyGlobal } from "../../MyGlobal";

/**
 * Verify the Bearer token of a request.
 *
 * @returns Decoded payload, or `null` when the request carries no
 *   `Authorization` header at all
 * @throws {UnauthorizedException} When the header is malformed, or the token
 *   is expired or not signed by this server
 */
export function jwtAuthorize(props: {
  request: { headers: { authorization?: string } };
}): jwt.JwtPayload | null {
  const header: string | undefined = props.request.headers.authorization;
  if (header === undefined || header.length === 0) return null;
  else if (header.startsWith(BEARER_PREFIX) === false)
    throw new UnauthorizedException("Invalid token");

  const token: string = header.substring(BEARER_PREFIX.length);
  try {
    const verified: string | jwt.JwtPayload = jwt.verify(
      token,
      MyGlobal.env.JWT_SECRET_KEY,
      { issuer: jwtAuthorize.ISSUER },
    );
    if (typeof verified === "string")
      throw new UnauthorizedException("Invalid token");
    return verified;
  } catch (error) {
    if (error instanceof UnauthorizedException) throw error;
    throw new UnauthorizedException(
      error instanceof jwt.TokenExpiredError ? "Token expired" : "Invalid token",
    );
  }
}
export namespace jwtAuthorize {
  /** Issuer claim of every token signed by this server. */
  export const ISSUER = "yamdb";
}

const BEARER_PREFIX = "Bearer ";
