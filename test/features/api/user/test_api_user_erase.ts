import { deleteUsersUsername } from "../../../../src/providers/deleteUsersUsername";
import { getUsersUsername } from "../../../../src/providers/getUsersUsername";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Account deletion by an administrator.
 *
 * Business context:
 *
 * - Permissions read the stored account, so the token of a deleted account
 *   stops working at once.
 *
 * Steps:
 *
 * 1. Delete a user.
 * 2. Reading it gives 404.
 * 3. Its own token gives 401.
 */
export async function test_api_user_erase(connection: ITestConnection) {
  const admin = await TestMember.create(connection.db, "admin");
  const user = await TestMember.create(connection.db, "user");

  // 1) delete
  await deleteUsersUsername({
    db: connection.db,
    member: admin,
    username: user.username,
  });

  // 2) gone
  await validateHttpStatus("deleted account", 404, () =>
    getUsersUsername({
      db: connection.db,
      member: admin,
      username: user.username,
    }),
  );

  // 3) stale token
  await validateHttpStatus("stale token", 401, () =>
    getUsersUsername({ db: connection.db, member: user, username: "me" }),
  );
}
