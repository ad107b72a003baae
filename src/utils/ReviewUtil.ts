import { HttpException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { YamdbComment } from "../database/entities/YamdbComment";
import { YamdbReview } from "../database/entities/YamdbReview";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { ValidationUtil } from "./ValidationUtil";

/**
 * Lookups of the nested `/titles/{titleId}/reviews/{reviewId}/comments`
 * routes.
 *
 * A child addressed under the wrong parent is reported as missing.
 */
export namespace ReviewUtil {
  /** @throws {HttpException} 404 when the title does not exist */
  export async function title(
    db: EntityManager,
    titleId: number,
  ): Promise<void> {
    if ((await db.exists(YamdbTitle, { where: { id: titleId } })) === false)
      throw new HttpException("Not Found", 404);
  }

  /**
   * Load a review of the title with its author.
   *
   * @throws {HttpException} 404 when the title or the review does not exist
   */
  export async function review(
    db: EntityManager,
    titleId: number,
    reviewId: number,
  ): Promise<YamdbReview> {
    await title(db, titleId);
    const found: YamdbReview | null = await db.findOne(YamdbReview, {
      where: { id: reviewId, title_id: titleId },
      relations: { author: true },
    });
    if (found === null) throw new HttpException("Not Found", 404);
    return found;
  }

  /**
   * Load a comment of the review with its author.
   *
   * @throws {HttpException} 404 when any of the path records does not exist
   */
  export async function comment(
    db: EntityManager,
    titleId: number,
    reviewId: number,
    commentId: number,
  ): Promise<YamdbComment> {
    await review(db, titleId, reviewId);
    const found: YamdbComment | null = await db.findOne(YamdbComment, {
      where: { id: commentId, review_id: reviewId },
      relations: { author: true },
    });
    if (found === null) throw new HttpException("Not Found", 404);
    return found;
  }

  export const text = (value: unknown): string =>
    ValidationUtil.text("text", value, { min: 1 });

  export const score = (value: unknown): number =>
    ValidationUtil.integer("score", value, { min: 1, max: 10 });
}
