import { EntityManager } from "typeorm";

import { IYamdbComment } from "../api/structures/IYamdbComment";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { patchTitlesTitleIdReviewsReviewIdCommentsCommentId } from "./patchTitlesTitleIdReviewsReviewIdCommentsCommentId";

export async function putTitlesTitleIdReviewsReviewIdCommentsCommentId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  commentId: number;
  body: IYamdbComment.ICreate;
}): Promise<IYamdbComment> {
  return patchTitlesTitleIdReviewsReviewIdCommentsCommentId({
    ...props,
    method: "PUT",
  });
}
