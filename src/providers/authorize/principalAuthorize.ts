import { UnauthorizedException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { YamdbUser } from "../../database/entities/YamdbUser";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { IYamdbPrincipal } from "./IYamdbPrincipal";

/**
 * Resolve the principal of a request.
 *
 * The account is reloaded so that role changes and deletions take effect
 * before the token expires.
 *
 * @throws {UnauthorizedException} When the token refers to a deleted account
 */
export async function principalAuthorize(props: {
  db: EntityManager;
  member: MemberPayload | null;
}): Promise<IYamdbPrincipal> {
  if (props.member === null) return IYamdbPrincipal.ANONYMOUS;

  const user: YamdbUser | null = await props.db.findOne(YamdbUser, {
    where: { id: props.member.id },
  });
  if (user === null) throw new UnauthorizedException("User not found");

  return {
    type: "member",
    id: user.id,
    username: user.username,
    role: user.role,
  };
}
