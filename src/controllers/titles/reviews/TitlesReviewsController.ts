import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode } from "@nestjs/common";
import { tags } from "typia";
import { DataSource } from "typeorm";

import { IPage } from "../../../api/structures/IPage";
import { IYamdbReview } from "../../../api/structures/IYamdbReview";
import { MemberAuth } from "../../../decorators/MemberAuth";
import { MemberPayload } from "../../../decorators/payload/MemberPayload";
import { deleteTitlesTitleIdReviewsReviewId } from "../../../providers/deleteTitlesTitleIdReviewsReviewId";
import { getTitlesTitleIdReviews } from "../../../providers/getTitlesTitleIdReviews";
import { getTitlesTitleIdReviewsReviewId } from "../../../providers/getTitlesTitleIdReviewsReviewId";
import { patchTitlesTitleIdReviewsReviewId } from "../../../providers/patchTitlesTitleIdReviewsReviewId";
import { postTitlesTitleIdReviews } from "../../../providers/postTitlesTitleIdReviews";
import { putTitlesTitleIdReviewsReviewId } from "../../../providers/putTitlesTitleIdReviewsReviewId";

@Controller("/titles/:titleId/reviews")
export class TitlesReviewsController {
  public constructor(private readonly dataSource: DataSource) {}

  /** @tag Reviews */
  @TypedRoute.Get()
  public async index(
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedQuery() query: IPage.IRequest,
  ): Promise<IPage<IYamdbReview>> {
    return getTitlesTitleIdReviews({
      db: this.dataSource.manager,
      titleId,
      query,
    });
  }

  /**
   * Review the title as the requester, once per title.
   *
   * @tag Reviews
   */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbReview.ICreate,
  ): Promise<IYamdbReview> {
    return postTitlesTitleIdReviews({
      db: this.dataSource.manager,
      member,
      titleId,
      body,
    });
  }

  /** @tag Reviews */
  @TypedRoute.Get(":reviewId")
  public async at(
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
  ): Promise<IYamdbReview> {
    return getTitlesTitleIdReviewsReviewId({
      db: this.dataSource.manager,
      titleId,
      reviewId,
    });
  }

  /** @tag Reviews */
  @TypedRoute.Patch(":reviewId")
  public async update(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbReview.IUpdate,
  ): Promise<IYamdbReview> {
    return patchTitlesTitleIdReviewsReviewId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      body,
    });
  }

  /** @tag Reviews */
  @TypedRoute.Put(":reviewId")
  public async replace(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbReview.ICreate,
  ): Promise<IYamdbReview> {
    return putTitlesTitleIdReviewsReviewId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      body,
    });
  }

  /** @tag Reviews */
  @TypedRoute.Delete(":reviewId")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
  ): Promise<void> {
    return deleteTitlesTitleIdReviewsReviewId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
    });
  }
}
