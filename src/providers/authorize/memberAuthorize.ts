import { UnauthorizedException } from "@nestjs/common";

import { IEYamdbRole } from "../../api/structures/IEYamdbRole";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { jwtAuthorize } from "./jwtAuthorize";

/**
 * Authenticate the account behind a request.
 *
 * - Anonymous requests resolve to `null`, permissions decide later whether
 *   they may proceed
 * - Verifies the JWT via the shared jwtAuthorize
 * - Ensures the claims describe a member payload
 */
export function memberAuthorize(request: {
  headers: { authorization?: string };
}): MemberPayload | null {
  const claims = jwtAuthorize({ request });
  if (claims === null) return null;

  const { id, username, role, type } = claims;
  if (
    type !== "member" ||
    typeof id !== "number" ||
    Number.isInteger(id) === false ||
    typeof username !== "string" ||
    IEYamdbRole.is(role) === false
  )
    throw new UnauthorizedException("Invalid token");
  return { id, username, role, type };
}
