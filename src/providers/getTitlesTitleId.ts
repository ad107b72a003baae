import { EntityManager } from "typeorm";

import { IYamdbTitle } from "../api/structures/IYamdbTitle";
import { YamdbTitleTransformer } from "../transformers/YamdbTitleTransformer";
import { TitleUtil } from "../utils/TitleUtil";

/** Read a title with its rating, public. */
export async function getTitlesTitleId(props: {
  db: EntityManager;
  titleId: number;
}): Promise<IYamdbTitle> {
  const title = await TitleUtil.find(props.db, props.titleId);
  return YamdbTitleTransformer.transform(props.db, title);
}
