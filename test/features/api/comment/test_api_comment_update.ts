import { TestValidator } from "@nestia/e2e";

import { YamdbComment } from "../../../../src/database/entities/YamdbComment";
import { deleteTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../src/providers/deleteTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { patchTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../src/providers/patchTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { postTitlesTitleIdReviews } from "../../../../src/providers/postTitlesTitleIdReviews";
import { postTitlesTitleIdReviewsReviewIdComments } from "../../../../src/providers/postTitlesTitleIdReviewsReviewIdComments";
import { putTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../src/providers/putTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Editing and deleting a comment.
 *
 * Business context:
 *
 * - The author of the comment, moderators and administrators manage it.
 * - The author of the review has no right on its comments.
 *
 * Steps:
 *
 * 1. Alice reviews a title and Bob comments it.
 * 2. Alice fails to patch the comment, Bob replaces it.
 * 3. Alice fails to delete it, a moderator deletes it.
 */
export async function test_api_comment_update(connection: ITestConnection) {
  // 1) review and comment
  await TestCatalog.seed(connection.db);
  const admin = await TestMember.create(connection.db, "admin");
  const moderator = await TestMember.create(connection.db, "moderator");
  const alice = await TestMember.create(connection.db, "user");
  const bob = await TestMember.create(connection.db, "user");
  const title = await TestCatalog.title(connection.db, admin);
  const review = await postTitlesTitleIdReviews({
    db: connection.db,
    member: alice,
    titleId: title.id,
    body: { text: "Great", score: 9 },
  });
  const created = await postTitlesTitleIdReviewsReviewIdComments({
    db: connection.db,
    member: bob,
    titleId: title.id,
    reviewId: review.id,
    body: { text: "First" },
  });
  const target = {
    db: connection.db,
    titleId: title.id,
    reviewId: review.id,
    commentId: created.id,
  };

  // 2) edit
  await validateHttpStatus("review author patching", 403, () =>
    patchTitlesTitleIdReviewsReviewIdCommentsCommentId({
      ...target,
      member: alice,
      body: { text: "Hijacked" },
    }),
  );
  const edited = await putTitlesTitleIdReviewsReviewIdCommentsCommentId({
    ...target,
    member: bob,
    body: { text: "Edited" },
  });
  TestValidator.equals("edited", edited.text, "Edited");

  // 3) delete
  await validateHttpStatus("review author deleting", 403, () =>
    deleteTitlesTitleIdReviewsReviewIdCommentsCommentId({
      ...target,
      member: alice,
    }),
  );
  await deleteTitlesTitleIdReviewsReviewIdCommentsCommentId({
    ...target,
    member: moderator,
  });
  TestValidator.equals("comments", await connection.db.count(YamdbComment), 0);
}
