import { EntityManager } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbComment } from "../api/structures/IYamdbComment";
import { YamdbComment } from "../database/entities/YamdbComment";
import { YamdbCommentTransformer } from "../transformers/YamdbCommentTransformer";
import { PaginationUtil } from "../utils/PaginationUtil";
import { ReviewUtil } from "../utils/ReviewUtil";

/**
 * List comments of a review, oldest first. Public.
 *
 * @throws {HttpException} 404 when the title or the review does not exist
 */
export async function getTitlesTitleIdReviewsReviewIdComments(props: {
  db: EntityManager;
  titleId: number;
  reviewId: number;
  query: IPage.IRequest;
}): Promise<IPage<IYamdbComment>> {
  const window = PaginationUtil.window(props.query);
  await ReviewUtil.review(props.db, props.titleId, props.reviewId);

  const [comments, records] = await props.db.findAndCount(YamdbComment, {
    where: { review_id: props.reviewId },
    relations: { author: true },
    order: { id: "ASC" },
    skip: window.offset,
    take: window.limit,
  });
  return PaginationUtil.paginate({
    window,
    records,
    data: comments.map(YamdbCommentTransformer.transform),
  });
}
