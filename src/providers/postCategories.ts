import { EntityManager } from "typeorm";

import { IYamdbCategory } from "../api/structures/IYamdbCategory";
import { YamdbCategory } from "../database/entities/YamdbCategory";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { CatalogUtil } from "../utils/CatalogUtil";

/** Create a category, administrators only. */
export async function postCategories(props: {
  db: EntityManager;
  member: MemberPayload | null;
  body: IYamdbCategory.ICreate;
}): Promise<IYamdbCategory> {
  return CatalogUtil.create({ ...props, target: YamdbCategory });
}
