import { EntityManager } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbCategory } from "../api/structures/IYamdbCategory";
import { YamdbCategory } from "../database/entities/YamdbCategory";
import { CatalogUtil } from "../utils/CatalogUtil";

/**
 * List categories, public.
 *
 * `search` filters by a case insensitive substring of the name. Records are
 * ordered by name.
 */
export async function getCategories(props: {
  db: EntityManager;
  query: IYamdbCategory.IRequest;
}): Promise<IPage<IYamdbCategory>> {
  return CatalogUtil.index({ ...props, target: YamdbCategory });
}
