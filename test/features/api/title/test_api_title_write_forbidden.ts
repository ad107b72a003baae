import { deleteTitlesTitleId } from "../../../../src/providers/deleteTitlesTitleId";
import { patchTitlesTitleId } from "../../../../src/providers/patchTitlesTitleId";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { TestCatalog } from "../../../helpers/TestCatalog";
import { TestMember } from "../../../helpers/TestMember";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Title writes are reserved to administrators.
 *
 * Steps:
 *
 * 1. A plain member creating a title gets 403.
 * 2. A plain member updating a missing title gets 403, before the lookup.
 * 3. An anonymous caller deleting a missing title gets 401.
 */
export async function test_api_title_write_forbidden(
  connection: ITestConnection,
) {
  await TestCatalog.seed(connection.db);
  const user = await TestMember.create(connection.db, "user");

  // 1) create
  await validateHttpStatus("member creating", 403, () =>
    TestCatalog.title(connection.db, user),
  );

  // 2) update
  await validateHttpStatus("member updating", 403, () =>
    patchTitlesTitleId({
      db: connection.db,
      member: user,
      titleId: 404,
      body: { name: "Renamed" },
    }),
  );

  // 3) delete
  await validateHttpStatus("anonymous deleting", 401, () =>
    deleteTitlesTitleId({ db: connection.db, member: null, titleId: 404 }),
  );
}
