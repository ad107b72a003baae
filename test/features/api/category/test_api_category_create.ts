import { RandomGenerator, TestValidator } from "@nestia/e2e";
import typia from "typia";

import { IYamdbCategory } from "../../../../src/api/structures/IYamdbCategory";
import { postCategories } from "../../../../src/providers/postCategories";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Category creation.
 *
 * Steps:
 *
 * 1. Anonymous creation gives 401, a plain member's 403.
 * 2. An administrator creates the category.
 */
export async function test_api_category_create(connection: ITestConnection) {
  const admin = await TestMember.create(connection.db, "admin");
  const user = await TestMember.create(connection.db, "user");
  const body = {
    name: RandomGenerator.name(),
    slug: RandomGenerator.alphabets(12),
  } satisfies IYamdbCategory.ICreate;

  // 1) denied
  await validateHttpStatus("anonymous", 401, () =>
    postCategories({ db: connection.db, member: null, body }),
  );
  await validateHttpStatus("member", 403, () =>
    postCategories({ db: connection.db, member: user, body }),
  );

  // 2) created
  const created: IYamdbCategory = await postCategories({
    db: connection.db,
    member: admin,
    body,
  });
  typia.assert(created);
  TestValidator.equals("created", created, body);
}
