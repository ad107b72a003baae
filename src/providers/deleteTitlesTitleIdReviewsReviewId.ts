import { EntityManager } from "typeorm";

import { YamdbReview } from "../database/entities/YamdbReview";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Delete a review with its comments, by its author, a moderator or an
 * administrator.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when the title or the review does not exist
 * @throws {HttpException} 403 when the account may not delete the review
 */
export async function deleteTitlesTitleIdReviewsReviewId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
}): Promise<void> {
  const context: IYamdbPermission.IContext = {
    method: "DELETE",
    principal: await principalAuthorize(props),
  };
  YamdbPermission.assert(YamdbPermission.authorOrReadOnly, context);
  const review: YamdbReview = await ReviewUtil.review(
    props.db,
    props.titleId,
    props.reviewId,
  );
  YamdbPermission.assertObject(YamdbPermission.authorOrReadOnly, context, {
    kind: "review",
    author_id: review.author_id,
  });
  await props.db.delete(YamdbReview, { id: review.id });
}
