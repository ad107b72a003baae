import { EntityManager, Raw } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbUser } from "../api/structures/IYamdbUser";
import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbUserTransformer } from "../transformers/YamdbUserTransformer";
import { PaginationUtil } from "../utils/PaginationUtil";
import { SearchUtil } from "../utils/SearchUtil";
import { YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * List accounts, administrators only.
 *
 * `search` filters by a case insensitive substring of the username. Records
 * are ordered by registration.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 for non administrators
 */
export async function getUsers(props: {
  db: EntityManager;
  member: MemberPayload | null;
  query: IYamdbUser.IRequest;
}): Promise<IPage<IYamdbUser>> {
  const principal = await principalAuthorize(props);
  YamdbPermission.assert(YamdbPermission.admin, { method: "GET", principal });

  const window = PaginationUtil.window(props.query);
  const search: string | undefined = props.query.search?.trim();
  const [users, records] = await props.db.findAndCount(YamdbUser, {
    where:
      search !== undefined && search.length !== 0
        ? {
            username: Raw(
              (alias) => `LOWER(${alias}) LIKE :search ${SearchUtil.ESCAPE}`,
              { search: SearchUtil.contains(search) },
            ),
          }
        : {},
    order: { id: "ASC" },
    skip: window.offset,
    take: window.limit,
  });
  return PaginationUtil.paginate({
    window,
    records,
    data: users.map(YamdbUserTransformer.transform),
  });
}
