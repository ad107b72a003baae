import { EntityManager } from "typeorm";

import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { patchTitlesTitleId } from "./patchTitlesTitleId";

/** Replace a title, administrators only. */
export async function putTitlesTitleId(props: {
  db: EntityManager;
  member: MemberPayload | null;
  titleId: number;
  body: IYamdbTitle.ICreate;
}): Promise<IYamdbTitle> {
  return patchTitlesTitleId({ ...props, method: "PUT" });
}
