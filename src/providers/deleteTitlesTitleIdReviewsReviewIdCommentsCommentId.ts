import { EntityManager } from "typeorm";

import { YamdbComment } from "../database/entities/YamdbComment";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Delete a comment, by its author, a moderator or an administrator.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when any of the path records does not exist
 * @throws {HttpException} 403 when the account may not delete the comment
 */
export async function deleteTitlesTitleIdReviewsReviewIdCommentsCommentId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  commentId: number;
}): Promise<void> {
  const context: IYamdbPermission.IContext = {
    method: "DELETE",
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
  await props.db.delete(YamdbComment, { id: comment.id });
}
