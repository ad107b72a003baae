import { deleteTitlesTitleIdReviewsReviewId } from "../../../../src/providers/deleteTitlesTitleIdReviewsReviewId";
import { getTitlesTitleIdReviewsReviewId } from "../../../../src/providers/getTitlesTitleIdReviewsReviewId";
import { postTitlesTitleIdReviews } from "../../../../src/providers/postTitlesTitleIdReviews";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * A review is only found under its own title.
 *
 * Steps:
 *
 * 1. Review a title.
 * 2. Read it under another title, expect 404.
 * 3. Delete it under another title, expect 404.
 */
export async function test_api_review_other_title(
  connection: ITestConnection,
) {
  await TestCatalog.seed(connection.db);
  const admin = await TestMember.create(connection.db, "admin");
  const user = await TestMember.create(connection.db, "user");
  const title = await TestCatalog.title(connection.db, admin);
  const other = await TestCatalog.title(connection.db, admin);

  // 1) review
  const created = await postTitlesTitleIdReviews({
    db: connection.db,
    member: user,
    titleId: title.id,
    body: { text: "Review", score: 6 },
  });

  // 2) read
  await validateHttpStatus("read elsewhere", 404, () =>
    getTitlesTitleIdReviewsReviewId({
      db: connection.db,
      titleId: other.id,
      reviewId: created.id,
    }),
  );

  // 3) delete
  await validateHttpStatus("delete elsewhere", 404, () =>
    deleteTitlesTitleIdReviewsReviewId({
      db: connection.db,
      member: admin,
      titleId: other.id,
      reviewId: created.id,
    }),
  );
}
