import { EntityManager } from "typeorm";

import { IYamdbUser } from "../api/structures/IYamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbUserTransformer } from "../transformers/YamdbUserTransformer";
import { UserTargetUtil } from "../utils/UserTargetUtil";

/**
 * Read an account by username, or the requester's own through `me`.
 */
export async function getUsersUsername(props: {
  db: EntityManager;
  member: MemberPayload | null;
  username: string;
}): Promise<IYamdbUser> {
  const { user } = await UserTargetUtil.resolve({ ...props, method: "GET" });
  return YamdbUserTransformer.transform(user);
}
