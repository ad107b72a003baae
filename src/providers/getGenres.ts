import { EntityManager } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbGenre } from "../api/structures/IYamdbGenre";
import { YamdbGenre } from "../database/entities/YamdbGenre";
import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * List genres, public.
 *
 * `search` filters by a case insensitive substring of the name. Records are
 * ordered by name.
 */
export async function getGenres(props: {
  db: EntityManager;
  query: IYamdbGenre.IRequest;
}): Promise<IPage<IYamdbGenre>> {
  return CatalogUtil.index({ ...props, target: YamdbGenre });
}
