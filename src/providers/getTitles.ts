import { EntityManager } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { YamdbTitleTransformer } from "../transformers/YamdbTitleTransformer";
import { PaginationUtil } from "../utils/PaginationUtil";
import { SearchUtil } from "../utils/SearchUtil";

/**
 * List titles, public.
 *
 * Filters combine: `name` is a case insensitive substring, `genre` and
 * `category` are slugs, `year` is exact. Latest titles come first.
 */
export async function getTitles(props: {
  db: EntityManager;
  query: IYamdbTitle.IRequest;
}): Promise<IPage<IYamdbTitle>> {
  const window = PaginationUtil.window(props.query);
  const { name, genre, category, year } = props.query;

  const query = props.db
    .createQueryBuilder(YamdbTitle, "title")
    .leftJoinAndSelect("title.category", "category")
    .leftJoinAndSelect("title.genres", "genre")
    .orderBy("title.id", "DESC")
    .skip(window.offset)
    .take(window.limit);
  if (name !== undefined && name.trim().length !== 0)
    query.andWhere(`LOWER(title.name) LIKE :name ${SearchUtil.ESCAPE}`, {
      name: SearchUtil.contains(name.trim()),
    });
  if (category !== undefined)
    query.andWhere("category.slug = :category", { category });
  if (genre !== undefined)
    // filtering the joined genres would drop the others from the output
    query.andWhere(
      `EXISTS (
        SELECT 1 FROM yamdb_title_genres tg
        INNER JOIN yamdb_genres g ON g.id = tg.genre_id
        WHERE tg.title_id = title.id AND g.slug = :genre
      )`,
      { genre },
    );
  if (year !== undefined) query.andWhere("title.year = :year", { year });

  const [titles, records] = await query.getManyAndCount();
  return PaginationUtil.paginate({
    window,
    records,
    data: await YamdbTitleTransformer.transformAll(props.db, titles),
  });
}
