import { EntityManager } from "typeorm";

import { IYamdbReview } from "../api/structures/IYamdbReview";
import { YamdbReviewTransformer } from "../transformers/YamdbReviewTransformer";
import { ReviewUtil } from "../utils/ReviewUtil";

export async function getTitlesTitleIdReviewsReviewId(props: {
  db: EntityManager;
  titleId: number;
  reviewId: number;
}): Promise<IYamdbReview> {
  return YamdbReviewTransformer.transform(
    await ReviewUtil.review(props.db, props.titleId, props.reviewId),
  );
}
