import { EntityManager } from "typeorm";

import { IYamdbGenre } from "../api/structures/IYamdbGenre";
import { YamdbGenre } from "../database/entities/YamdbGenre";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { CatalogUtil } from "../utils/CatalogUtil";

/** Create a genre, administrators only. */
export async function postGenres(props: {
  db: EntityManager;
  member: MemberPayload | null;
  body: IYamdbGenre.ICreate;
}): Promise<IYamdbGenre> {
  return CatalogUtil.create({ ...props, target: YamdbGenre });
}
