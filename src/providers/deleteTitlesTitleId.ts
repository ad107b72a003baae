import { EntityManager } from "typeorm";

import { YamdbTitle } from "../database/entities/YamdbTitle";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { TitleUtil } from "../utils/TitleUtil";
import { IYamdbPermission, YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Delete a title with its reviews and their comments, administrators only.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 for non administrators
 * @throws {HttpException} 404 when the title does not exist
 */
export async function deleteTitlesTitleId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
}): Promise<void> {
  const context: IYamdbPermission.IContext = {
    method: "DELETE",
    principal: await principalAuthorize(props),
  };
  YamdbPermission.assert(YamdbPermission.adminOrReadOnly, context);
  const title: YamdbTitle = await TitleUtil.find(props.db, props.titleId);
  YamdbPermission.assertObject(YamdbPermission.adminOrReadOnly, context, {
    kind: "title",
    author_id: null,
  });
  await props.db.delete(YamdbTitle, { id: title.id });
}
