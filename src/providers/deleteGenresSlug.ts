import { EntityManager } from "typeorm";

import { YamdbGenre } from "../database/entities/YamdbGenre";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { CatalogUtil } from "../utils/CatalogUtil";

/** Delete a genre by slug, administrators only. */
export async function deleteGenresSlug(props: {
  db: EntityManager;
  member: MemberPayload | null;
  slug: string;
}): Promise<void> {
  return CatalogUtil.erase({ ...props, target: YamdbGenre });
}
