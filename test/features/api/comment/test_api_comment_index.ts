import { TestValidator } from "@nestia/e2e";
import typia from "typia";

import { YamdbComment } from "../../../../src/database/entities/YamdbComment";
import { deleteTitlesTitleIdReviewsReviewId } from "../../../../src/providers/deleteTitlesTitleIdReviewsReviewId";
import { getTitlesTitleIdReviewsReviewIdComments } from "../../../../src/providers/getTitlesTitleIdReviewsReviewIdComments";
import { postTitlesTitleIdReviews } from "../../../../src/providers/postTitlesTitleIdReviews";
import { postTitlesTitleIdReviewsReviewIdComments } from "../../../../src/providers/postTitlesTitleIdReviewsReviewIdComments";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";

/**
 * Comments of a review, oldest first, deleted with their review.
 *
 * Steps:
 *
 * 1. Alice reviews a title, Bob then Alice comment it.
 * 2. List the comments.
 * 3. Alice deletes her review, no comment is left.
 */
export async function test_api_comment_index(connection: ITestConnection) {
  // 1) review and comments
  await TestCatalog.seed(connection.db);
  const admin = await TestMember.create(connection.db, "admin");
  const alice = await TestMember.create(connection.db, "user");
  const bob = await TestMember.create(connection.db, "user");
  const title = await TestCatalog.title(connection.db, admin);
  const review = await postTitlesTitleIdReviews({
    db: connection.db,
    member: alice,
    titleId: title.id,
    body: { text: "Great", score: 9 },
  });
  for (const [member, text] of [
    [bob, "One"],
    [alice, "Two"],
  ] as const)
    await postTitlesTitleIdReviewsReviewIdComments({
      db: connection.db,
      member,
      titleId: title.id,
      reviewId: review.id,
      body: { text },
    });

  // 2) oldest first
  const page = await getTitlesTitleIdReviewsReviewIdComments({
    db: connection.db,
    titleId: title.id,
    reviewId: review.id,
    query: {},
  });
  typia.assert(page);
  TestValidator.equals(
    "comments",
    page.data.map((c) => [c.author, c.text]),
    [
      [bob.username, "One"],
      [alice.username, "Two"],
    ],
  );

  // 3) cascade
  await deleteTitlesTitleIdReviewsReviewId({
    db: connection.db,
    member: alice,
    titleId: title.id,
    reviewId: review.id,
  });
  TestValidator.equals(
    "comments left",
    await connection.db.count(YamdbComment),
    0,
  );
}
