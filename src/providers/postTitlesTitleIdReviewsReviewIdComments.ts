import { EntityManager } from "typeorm";

import { IYamdbComment } from "../api/structures/IYamdbComment";
import { YamdbComment } from "../database/entities/YamdbComment";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbCommentTransformer } from "../transformers/YamdbCommentTransformer";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPrincipal } from "./authorize/IYamdbPrincipal";
import { YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Comment a review as the authenticated account.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when the title or the review does not exist,
 *   or the review belongs to another title
 * @throws {HttpException} 400 when the text is blank
 */
export async function postTitlesTitleIdReviewsReviewIdComments(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  body: IYamdbComment.ICreate;
}): Promise<IYamdbComment> {
  const principal: IYamdbPrincipal = await principalAuthorize(props);
  YamdbPermission.assert(YamdbPermission.authorOrReadOnly, {
    method: "POST",
    principal,
  });
  const author: IYamdbPrincipal.IMember = IYamdbPrincipal.member(principal);
  await ReviewUtil.review(props.db, props.titleId, props.reviewId);

  const text: string = ReviewUtil.text(props.body.text);
  const created: YamdbComment = await props.db.save(
    props.db.create(YamdbComment, {
      review_id: props.reviewId,
      author_id: author.id,
      text,
    }),
  );
  return YamdbCommentTransformer.transform(
    await ReviewUtil.comment(
      props.db,
      props.titleId,
      props.reviewId,
      created.id,
    ),
  );
}
