import { EntityManager } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbReview } from "../api/structures/IYamdbReview";
import { YamdbReview } from "../database/entities/YamdbReview";
import { YamdbReviewTransformer } from "../transformers/YamdbReviewTransformer";
import { PaginationUtil } from "../utils/PaginationUtil";
import { ReviewUtil } from "../utils/ReviewUtil";

/**
 * List reviews of a title, latest first. Public.
 *
 * @throws {HttpException} 404 when the title does not exist
 */
export async function getTitlesTitleIdReviews(props: {
  db: EntityManager;
  titleId: number;
  query: IPage.IRequest;
}): Promise<IPage<IYamdbReview>> {
  const window = PaginationUtil.window(props.query);
  await ReviewUtil.title(props.db, props.titleId);

  const [reviews, records] = await props.db.findAndCount(YamdbReview, {
    where: { title_id: props.titleId },
    relations: { author: true },
    order: { id: "DESC" },
    skip: window.offset,
    take: window.limit,
  });
  return PaginationUtil.paginate({
    window,
    records,
    data: reviews.map(YamdbReviewTransformer.transform),
  });
}
