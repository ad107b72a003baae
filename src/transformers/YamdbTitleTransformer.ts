import { EntityManager } from "typeorm";

import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { YamdbReview } from "../database/entities/YamdbReview";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { YamdbCatalogTransformer } from "./YamdbCatalogTransformer";

export namespace YamdbTitleTransformer {
  /**
   * Transform titles loaded with their category and genres.
   *
   * Ratings of the whole batch are aggregated in a single query.
   */
  export async function transformAll(
    db: EntityManager,
    titles: YamdbTitle[],
  ): Promise<IYamdbTitle[]> {
    const ratings: Map<number, number> = await rate(
      db,
      titles.map((t) => t.id),
    );
    return titles.map((title) => ({
      id: title.id,
      name: title.name,
      year: title.year,
      rating: ratings.get(title.id) ?? null,
      description: title.description,
      genre: [...title.genres]
        .sort((a, b) => a.slug.localeCompare(b.slug))
        .map(YamdbCatalogTransformer.transform),
      category:
        title.category !== null
          ? YamdbCatalogTransformer.transform(title.category)
          : null,
    }));
  }

  export async function transform(
    db: EntityManager,
    title: YamdbTitle,
  ): Promise<IYamdbTitle> {
    const [output] = await transformAll(db, [title]);
    return output;
  }

  /** Average review score per title ID, titles without reviews omitted. */
  export async function rate(
    db: EntityManager,
    ids: number[],
  ): Promise<Map<number, number>> {
    if (ids.length === 0) return new Map();

    const rows: IRatingRow[] = await db
      .createQueryBuilder(YamdbReview, "review")
      .select("review.title_id", "title_id")
      .addSelect("AVG(review.score)", "rating")
      .where("review.title_id IN (:...ids)", { ids })
      .groupBy("review.title_id")
      .getRawMany<IRatingRow>();
    // PostgreSQL returns AVG() of integers as a numeric string
    return new Map(rows.map((r) => [Number(r.title_id), Number(r.rating)]));
  }

  interface IRatingRow {
    title_id: number | string;
    rating: number | string;
  }
}
