import { TestValidator } from "@nestia/e2e";
import typia from "typia";

import { IYamdbUser } from "../../../../src/api/structures/IYamdbUser";
import { YamdbUser } from "../../../../src/database/entities/YamdbUser";
import { getUsersUsername } from "../../../../src/providers/getUsersUsername";
import { patchUsersUsername } from "../../../../src/providers/patchUsersUsername";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * The `me` alias.
 *
 * Business context:
 *
 * - Any member reads and updates its own account through `/users/me`.
 * - Only administrators change roles: a member's own `role` is ignored.
 *
 * Steps:
 *
 * 1. Read `me` as a member, then anonymously (401).
 * 2. Update `me` with a role and a bio.
 * 3. Only the bio is stored.
 */
export async function test_api_user_me(connection: ITestConnection) {
  const user = await TestMember.create(connection.db, "user");

  // 1) read
  const me: IYamdbUser = await getUsersUsername({
    db: connection.db,
    member: user,
    username: "me",
  });
  typia.assert(me);
  TestValidator.equals("username", me.username, user.username);
  await validateHttpStatus("anonymous", 401, () =>
    getUsersUsername({ db: connection.db, member: null, username: "me" }),
  );

  // 2) update
  const updated: IYamdbUser = await patchUsersUsername({
    db: connection.db,
    member: user,
    username: "me",
    body: { role: "admin", bio: "hello" },
  });
  TestValidator.equals("role kept", updated.role, "user");
  TestValidator.equals("bio", updated.bio, "hello");

  // 3) stored
  const stored: YamdbUser = await connection.db.findOneByOrFail(YamdbUser, {
    id: user.id,
  });
  TestValidator.equals("stored role", stored.role, "user");
  TestValidator.equals("stored bio", stored.bio, "hello");
}
