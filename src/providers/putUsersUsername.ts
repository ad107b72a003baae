import { EntityManager } from "typeorm";

import { IYamdbUser } from "../api/structures/IYamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { patchUsersUsername } from "./patchUsersUsername";

/**
 * Replace an account by username, or the requester's own through `me`.
 *
 * Same rules as {@link patchUsersUsername}, with the username and the email
 * required.
 */
export async function putUsersUsername(props: {
  db: EntityManager;
  member: MemberPayload | null;
  username: string;
  body: IYamdbUser.ICreate;
}): Promise<IYamdbUser> {
  return patchUsersUsername({ ...props, method: "PUT" });
}
