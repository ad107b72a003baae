import { EntityManager } from "typeorm";

import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { YamdbGenre } from "../database/entities/YamdbGenre";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbTitleTransformer } from "../transformers/YamdbTitleTransformer";
import { TitleUtil } from "../utils/TitleUtil";
import { ValidationUtil } from "../utils/ValidationUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Update a title, administrators only.
 *
 * Omitted properties are left untouched, except under `PUT` where name, year,
 * genre and category are required. Sending `genre` replaces the whole set.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 for non administrators
 * @throws {HttpException} 404 when the title does not exist
 * @throws {HttpException} 400 when a field is malformed, the year is in the
 *   future or a slug is unknown
 */
export async function patchTitlesTitleId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  body: IYamdbTitle.IUpdate;
  method?: IYamdbPermission.Method;
}): Promise<IYamdbTitle> {
  const context: IYamdbPermission.IContext = {
    method: props.method ?? "PATCH",
    principal: await principalAuthorize(props),
  };
  YamdbPermission.assert(YamdbPermission.adminOrReadOnly, context);
  const title: YamdbTitle = await TitleUtil.find(props.db, props.titleId);
  YamdbPermission.assertObject(YamdbPermission.adminOrReadOnly, context, {
    kind: "title",
    author_id: null,
  });

  const { body } = props;
  const replace: boolean = context.method === "PUT";
  const changes: Partial<
    Pick<YamdbTitle, "name" | "year" | "description" | "category_id">
  > = {};
  if (body.name !== undefined || replace)
    changes.name = ValidationUtil.text("name", body.name, { min: 1, max: 256 });
  if (body.year !== undefined || replace)
    changes.year = TitleUtil.year(body.year);
  if (body.description !== undefined)
    changes.description = TitleUtil.description(body.description);
  if (body.category !== undefined || replace)
    changes.category_id = (await TitleUtil.category(props.db, body.category)).id;
  const genres: YamdbGenre[] | null =
    body.genre !== undefined || replace
      ? await TitleUtil.genres(props.db, body.genre)
      : null;

  await props.db.transaction(async (tx) => {
    if (Object.keys(changes).length !== 0)
      await tx.update(YamdbTitle, { id: title.id }, changes);
    if (genres !== null)
      await tx
        .createQueryBuilder()
        .relation(YamdbTitle, "genres")
        .of(title.id)
        .addAndRemove(
          genres.map((g) => g.id),
          title.genres.map((g) => g.id),
        );
  });
  return YamdbTitleTransformer.transform(
    props.db,
    await TitleUtil.find(props.db, title.id),
  );
}
