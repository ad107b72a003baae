import { EntityManager } from "typeorm";

import { IYamdbComment } from "../api/structures/IYamdbComment";
import { YamdbComment } from "../database/entities/YamdbComment";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbCommentTransformer } from "../transformers/YamdbCommentTransformer";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Update a comment, by its author, a moderator or an administrator.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when any of the path records does not exist
 * @throws {HttpException} 403 when the account may not edit the comment
 * @throws {HttpException} 400 when the text is blank
 */
export async function patchTitlesTitleIdReviewsReviewIdCommentsCommentId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  commentId: number;
  body: IYamdbComment.IUpdate;
  method?: IYamdbPermission.Method;
}): Promise<IYamdbComment> {
  const context: IYamdbPermission.IContext = {
    method: props.method ?? "PATCH",
    principal: await principalAuthorize(props),
  };
  YamdbPermission.assert(YamdbPermission.authorOrReadOnly, context);
  const comment: YamdbComment = await ReviewUtil.comment(
    props.db,
    props.titleId,
    props.reviewId,
    props.commentId,
  );
  YamdbPermission.assertObject(YamdbPermission.authorOrReadOnly, context, {
    kind: "comment",
    author_id: comment.author_id,
  });

  if (props.body.text === undefined && context.method !== "PUT")
    return YamdbCommentTransformer.transform(comment);
  const text: string = ReviewUtil.text(props.body.text);
  await props.db.update(YamdbComment, { id: comment.id }, { text });
  return YamdbCommentTransformer.transform({ ...comment, text });
}
