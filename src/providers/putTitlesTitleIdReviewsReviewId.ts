import { EntityManager } from "typeorm";

import { IYamdbReview } from "../api/structures/IYamdbReview";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { patchTitlesTitleIdReviewsReviewId } from "./patchTitlesTitleIdReviewsReviewId";

export async function putTitlesTitleIdReviewsReviewId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  reviewId: number;
  body: IYamdbReview.ICreate;
}): Promise<IYamdbReview> {
  return patchTitlesTitleIdReviewsReviewId({ ...props, method: "PUT" });
}
