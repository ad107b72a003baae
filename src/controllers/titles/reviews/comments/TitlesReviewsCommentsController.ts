import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode } from "@nestjs/common";
import { tags } from "typia";
import { DataSource } from "typeorm";

import { IPage } from "../../../../api/structures/IPage";
import { IYamdbComment } from "../../../../api/structures/IYamdbComment";
import { MemberAuth } from "../../../../decorators/MemberAuth";
import { MemberPayload } from "../../../../decorators/payload/MemberPayload";
import { deleteTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../providers/deleteTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { getTitlesTitleIdReviewsReviewIdComments } from "../../../../providers/getTitlesTitleIdReviewsReviewIdComments";
import { getTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../providers/getTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { patchTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../providers/patchTitlesTitleIdReviewsReviewIdCommentsCommentId";
import { postTitlesTitleIdReviewsReviewIdComments } from "../../../../providers/postTitlesTitleIdReviewsReviewIdComments";
import { putTitlesTitleIdReviewsReviewIdCommentsCommentId } from "../../../../providers/putTitlesTitleIdReviewsReviewIdCommentsCommentId";

@Controller("/titles/:titleId/reviews/:reviewId/comments")
export class TitlesReviewsCommentsController {
  public constructor(private readonly dataSource: DataSource) {}

  /** @tag Comments */
  @TypedRoute.Get()
  public async index(
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedQuery() query: IPage.IRequest,
  ): Promise<IPage<IYamdbComment>> {
    return getTitlesTitleIdReviewsReviewIdComments({
      db: this.dataSource.manager,
      titleId,
      reviewId,
      query,
    });
  }

  /** @tag Comments */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbComment.ICreate,
  ): Promise<IYamdbComment> {
    return postTitlesTitleIdReviewsReviewIdComments({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      body,
    });
  }

  /** @tag Comments */
  @TypedRoute.Get(":commentId")
  public async at(
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedParam("commentId") commentId: number & tags.Type<"uint32">,
  ): Promise<IYamdbComment> {
    return getTitlesTitleIdReviewsReviewIdCommentsCommentId({
      db: this.dataSource.manager,
      titleId,
      reviewId,
      commentId,
    });
  }

  /** @tag Comments */
  @TypedRoute.Patch(":commentId")
  public async update(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedParam("commentId") commentId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbComment.IUpdate,
  ): Promise<IYamdbComment> {
    return patchTitlesTitleIdReviewsReviewIdCommentsCommentId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      commentId,
      body,
    });
  }

  /** @tag Comments */
  @TypedRoute.Put(":commentId")
  public async replace(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedParam("commentId") commentId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbComment.ICreate,
  ): Promise<IYamdbComment> {
    return putTitlesTitleIdReviewsReviewIdCommentsCommentId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      commentId,
      body,
    });
  }

  /** @tag Comments */
  @TypedRoute.Delete(":commentId")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedParam("reviewId") reviewId: number & tags.Type<"uint32">,
    @TypedParam("commentId") commentId: number & tags.Type<"uint32">,
  ): Promise<void> {
    return deleteTitlesTitleIdReviewsReviewIdCommentsCommentId({
      db: this.dataSource.manager,
      member,
      titleId,
      reviewId,
      commentId,
    });
  }
}
