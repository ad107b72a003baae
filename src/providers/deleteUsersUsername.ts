import { EntityManager } from "typeorm";

import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { UserTargetUtil } from "../utils/UserTargetUtil";

/**
 * Delete an account, administrators only.
 *
 * Reviews and comments of the account go with it. The `me` alias refuses
 * deletion with 405, whatever the role.
 */
export async function deleteUsersUsername(props: {
  db: EntityManager;
  member: MemberPayload | null;
  username: string;
}): Promise<void> {
  const { user } = await UserTargetUtil.resolve({
    ...props,
    method: "DELETE",
  });
  await props.db.delete(YamdbUser, { id: user.id });
}
