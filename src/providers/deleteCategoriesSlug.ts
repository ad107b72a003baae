import { EntityManager } from "typeorm";

import { YamdbCategory } from "../database/entities/YamdbCategory";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { CatalogUtil } from "../utils/CatalogUtil";

/** Delete a category by slug, administrators only. */
export async function deleteCategoriesSlug(props: {
  db: EntityManager;
  member: MemberPayload | null;
  slug: string;
}): Promise<void> {
  return CatalogUtil.erase({ ...props, target: YamdbCategory });
}
