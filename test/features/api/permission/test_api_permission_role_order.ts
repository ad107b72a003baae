import { TestValidator } from "@nestia/e2e";

import { IEYamdbRole } from "../../../../src/api/structures/IEYamdbRole";

/** Roles compare by authority, unknown names are no role. */
export async function test_api_permission_role_order() {
  TestValidator.predicate(
    "admin is at least moderator",
    IEYamdbRole.atLeast("admin", "moderator"),
  );
  TestValidator.predicate(
    "moderator is at least moderator",
    IEYamdbRole.atLeast("moderator", "moderator"),
  );
  TestValidator.predicate(
    "user is below moderator",
    !IEYamdbRole.atLeast("user", "moderator"),
  );
  TestValidator.predicate("superuser is no role", !IEYamdbRole.is("superuser"));
}
