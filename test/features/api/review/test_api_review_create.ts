import { RandomGenerator, TestValidator } from "@nestia/e2e";
import typia, { tags } from "typia";

import { IYamdbReview } from "../../../../src/api/structures/IYamdbReview";
import { getTitlesTitleIdReviewsReviewId } from "../../../../src/providers/getTitlesTitleIdReviewsReviewId";
import { postTitlesTitleIdReviews } from "../../../../src/providers/postTitlesTitleIdReviews";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";

/**
 * Writing a review.
 *
 * Business context:
 *
 * - The author is the requester, the publication date is set by the
 *   server.
 *
 * Steps:
 *
 * 1. Create a title.
 * 2. Review it as a member with a random score.
 * 3. Read the review back.
 */
export async function test_api_review_create(connection: ITestConnection) {
  // 1) title
  await TestCatalog.seed(connection.db);
  const admin = await TestMember.create(connection.db, "admin");
  const user = await TestMember.create(connection.db, "user");
  const title = await TestCatalog.title(connection.db, admin);

  // 2) review
  const body = {
    text: RandomGenerator.paragraph({ sentences: 4 }),
    score: typia.random<
      number & tags.Type<"int32"> & tags.Minimum<1> & tags.Maximum<10>
    >(),
  } satisfies IYamdbReview.ICreate;
  const created: IYamdbReview = await postTitlesTitleIdReviews({
    db: connection.db,
    member: user,
    titleId: title.id,
    body,
  });
  typia.assert(created);
  TestValidator.equals("created", created, {
    id: created.id,
    text: body.text,
    author: user.username,
    score: body.score,
    pub_date: created.pub_date,
  });

  // 3) read
  const read: IYamdbReview = await getTitlesTitleIdReviewsReviewId({
    db: connection.db,
    titleId: title.id,
    reviewId: created.id,
  });
  TestValidator.equals("read", read, created);
}
