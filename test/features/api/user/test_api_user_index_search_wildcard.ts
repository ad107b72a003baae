import { TestValidator } from "@nestia/e2e";

import { getUsers } from "../../../../src/providers/getUsers";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestMember } from "../../../helpers/TestMember";

/**
 * Username search takes `_` and `%` literally.
 *
 * Steps:
 *
 * 1. Register `a_b` and `axb`.
 * 2. Search `a_b`, only `a_b` matches.
 * 3. Search `%`, nothing matches.
 */
export async function test_api_user_index_search_wildcard(
  connection: ITestConnection,
) {
  // 1) accounts
  const admin = await TestMember.create(connection.db, "admin", "root");
  await TestMember.create(connection.db, "user", "a_b");
  await TestMember.create(connection.db, "user", "axb");

  // 2) underscore
  const underscore = await getUsers({
    db: connection.db,
    member: admin,
    query: { search: "a_b" },
  });
  TestValidator.equals(
    "underscore",
    underscore.data.map((u) => u.username),
    ["a_b"],
  );

  // 3) percent
  const percent = await getUsers({
    db: connection.db,
    member: admin,
    query: { search: "%" },
  });
  TestValidator.equals("percent", percent.pagination.records, 0);
}
