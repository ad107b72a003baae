import { EntityManager } from "typeorm";

import { IYamdbComment } from "../api/structures/IYamdbComment";
import { YamdbCommentTransformer } from "../transformers/YamdbCommentTransformer";
import { ReviewUtil } from "../utils/ReviewUtil";

export async function getTitlesTitleIdReviewsReviewIdCommentsCommentId(props: {
  db: EntityManager;
  titleId: number;
  reviewId: number;
  commentId: number;
}): Promise<IYamdbComment> {
  return YamdbCommentTransformer.transform(
    await ReviewUtil.comment(
      props.db,
      props.titleId,
      props.reviewId,
      props.commentId,
    ),
  );
}
