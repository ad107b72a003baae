import { EntityManager } from "typeorm";

import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbTitleTransformer } from "../transformers/YamdbTitleTransformer";
import { TitleUtil } from "../utils/TitleUtil";
import { ValidationUtil } from "../utils/ValidationUtil";
import { YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Create a title, administrators only.
 *
 * Genres and category are given by slug and must already exist. A fresh
 * title has no review, so its rating is `null`.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 for non administrators
 * @throws {HttpException} 400 when a field is malformed, the year is in the
 *   future or a slug is unknown
 */
export async function postTitles(props: {
  db: EntityManager;
  member: MemberPayload | null;
  body: IYamdbTitle.ICreate;
}): Promise<IYamdbTitle> {
  const principal = await principalAuthorize(props);
  YamdbPermission.assert(YamdbPermission.adminOrReadOnly, {
    method: "POST",
    principal,
  });

  const { body } = props;
  const name: string = ValidationUtil.text("name", body.name, {
    min: 1,
    max: 256,
  });
  const year: number = TitleUtil.year(body.year);
  const description: string | null =
    body.description === undefined
      ? null
      : TitleUtil.description(body.description);
  const genres = await TitleUtil.genres(props.db, body.genre);
  const category = await TitleUtil.category(props.db, body.category);

  const created: YamdbTitle = await props.db.save(
    props.db.create(YamdbTitle, {
      name,
      year,
      description,
      category_id: category.id,
      category,
      genres,
    }),
  );
  return YamdbTitleTransformer.transform(
    props.db,
    await TitleUtil.find(props.db, created.id),
  );
}
