import { IYamdbReview } from "../api/structures/IYamdbReview";
import { YamdbReview } from "../database/entities/YamdbReview";
import { toISOStringSafe } from "../utils/toISOStringSafe";

export namespace YamdbReviewTransformer {
  /** Requires the `author` relation to be loaded. */
  export const transform = (review: YamdbReview): IYamdbReview => ({
    id: review.id,
    text: review.text,
    author: review.author.username,
    score: review.score,
    pub_date: toISOStringSafe(review.created_at),
  });
}
