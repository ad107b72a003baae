import { TestValidator } from "@nestia/e2e";
import typia from "typia";

import { getTitlesTitleIdReviews } from "../../../../src/providers/getTitlesTitleIdReviews";
import { postTitlesTitleIdReviews } from "../../../../src/providers/postTitlesTitleIdReviews";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Reviews of a title, latest first.
 *
 * Steps:
 *
 * 1. Two members review a title in turn.
 * 2. The first page of one record is the latest review.
 * 3. Listing under a missing title gives 404.
 */
export async function test_api_review_index(connection: ITestConnection) {
  await TestCatalog.seed(connection.db);
  const admin = await TestMember.create(connection.db, "admin");
  const title = await TestCatalog.title(connection.db, admin);

  // 1) reviews
  const former = await TestMember.create(connection.db, "user");
  const latter = await TestMember.create(connection.db, "user");
  for (const member of [former, latter])
    await postTitlesTitleIdReviews({
      db: connection.db,
      member,
      titleId: title.id,
      body: { text: `Review of ${member.username}`, score: 6 },
    });

  // 2) latest first
  const page = await getTitlesTitleIdReviews({
    db: connection.db,
    titleId: title.id,
    query: { limit: 1 },
  });
  typia.assert(page);
  TestValidator.equals("pagination", page.pagination, {
    offset: 0,
    limit: 1,
    records: 2,
  });
  TestValidator.equals(
    "latest author",
    page.data.map((r) => r.author),
    [latter.username],
  );

  // 3) missing title
  await validateHttpStatus("missing title", 404, () =>
    getTitlesTitleIdReviews({
      db: connection.db,
      titleId: title.id + 100,
      query: {},
    }),
  );
}
