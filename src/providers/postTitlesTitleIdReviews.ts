import { HttpException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { IYamdbReview } from "../api/structures/IYamdbReview";
import { YamdbReview } from "../database/entities/YamdbReview";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbReviewTransformer } from "../transformers/YamdbReviewTransformer";
import { ExceptionUtil } from "../utils/ExceptionUtil";
import { ReviewUtil } from "../utils/ReviewUtil";
import { IYamdbPrincipal } from "./authorize/IYamdbPrincipal";
import { YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Review a title as the authenticated account.
 *
 * Author and title come from the request, never from the body. Each account
 * reviews a title at most once.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 404 when the title does not exist
 * @throws {HttpException} 400 when a field is malformed or the account
 *   already reviewed the title
 */
export async function postTitlesTitleIdReviews(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  body: IYamdbReview.ICreate;
}): Promise<IYamdbReview> {
  const principal: IYamdbPrincipal = await principalAuthorize(props);
  YamdbPermission.assert(YamdbPermission.authorOrReadOnly, {
    method: "POST",
    principal,
  });
  const author: IYamdbPrincipal.IMember = IYamdbPrincipal.member(principal);
  await ReviewUtil.title(props.db, props.titleId);

  const text: string = ReviewUtil.text(props.body.text);
  const score: number = ReviewUtil.score(props.body.score);
  if (
    await props.db.exists(YamdbReview, {
      where: { title_id: props.titleId, author_id: author.id },
    })
  )
    throw new HttpException(DUPLICATE, 400);

  let created: YamdbReview;
  try {
    created = await props.db.save(
      props.db.create(YamdbReview, {
        title_id: props.titleId,
        author_id: author.id,
        text,
        score,
      }),
    );
  } catch (error) {
    if (ExceptionUtil.isUniqueViolation(error))
      throw new HttpException(DUPLICATE, 400);
    throw error;
  }
  return YamdbReviewTransformer.transform(
    await ReviewUtil.review(props.db, props.titleId, created.id),
  );
}

const DUPLICATE = "Bad Request: you have already reviewed this title";
