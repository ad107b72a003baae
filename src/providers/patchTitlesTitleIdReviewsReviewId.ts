import { EntityManager } from "typeorm";

import { IYamdbReview } from "../api/structures/IYamdbReview";
import { YamdbReview } from "../database/entities/YamdbReview";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbReviewTransformer } from "../transformers/YamdbReviewTransformer";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Update a review, by its author, a moderator or an administrator.
 *
 * Omitted properties are left untouched, except under `PUT` where both are
 * required. Author and title never change.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when the title or the review does not exist
 * @throws {HttpException} 403 when the account may not edit the review
 * @throws {HttpException} 400 when a field is malformed
 */
export async function patchTitlesTitleIdReviewsReviewId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  body: IYamdbReview.IUpdate;
  method?: IYamdbPermission.Method;
}): Promise<IYamdbReview> {
  const context: IYamdbPermission.IContext = {
    method: props.method ?? "PATCH",
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

  const replace: boolean = context.method === "PUT";
  const changes: Partial<Pick<YamdbReview, "text" | "score">> = {};
  if (props.body.text !== undefined || replace)
    changes.text = ReviewUtil.text(props.body.text);
  if (props.body.score !== undefined || replace)
    changes.score = ReviewUtil.score(props.body.score);

  if (Object.keys(changes).length !== 0)
    await props.db.update(YamdbReview, { id: review.id }, changes);
  return YamdbReviewTransformer.transform({ ...review, ...changes });
}
