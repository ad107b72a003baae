import { TestValidator } from "@nestia/e2e";

import { IYamdbPrincipal } from "../../../../src/providers/authorize/IYamdbPrincipal";
import { YamdbPermission } from "../../../../src/providers/authorize/YamdbPermission";

/**
 * Administrator rules.
 *
 * `admin` guards the user administration whatever the method, while
 * `adminOrReadOnly` opens reads of the catalog to everyone.
 *
 * Steps:
 *
 * 1. Check `admin` for a moderator, an administrator and an anonymous caller.
 * 2. Check `adminOrReadOnly` reads and writes.
 */
export async function test_api_permission_admin() {
  const moderator: IYamdbPrincipal.IMember = {
    type: "member",
    id: 1,
    username: "mod",
    role: "moderator",
  };
  const admin: IYamdbPrincipal.IMember = {
    type: "member",
    id: 2,
    username: "root",
    role: "admin",
  };
  const user: IYamdbPrincipal.IMember = {
    type: "member",
    id: 3,
    username: "alice",
    role: "user",
  };

  // 1) admin, even on GET
  TestValidator.equals(
    "moderator reading users",
    YamdbPermission.admin.hasPermission({
      method: "GET",
      principal: moderator,
    }),
    false,
  );
  TestValidator.equals(
    "admin reading users",
    YamdbPermission.admin.hasPermission({ method: "GET", principal: admin }),
    true,
  );
  TestValidator.equals(
    "anonymous reading users",
    YamdbPermission.admin.hasPermission({
      method: "GET",
      principal: IYamdbPrincipal.ANONYMOUS,
    }),
    false,
  );

  // 2) adminOrReadOnly
  const permission = YamdbPermission.adminOrReadOnly;
  TestValidator.equals(
    "anonymous reading catalog",
    permission.hasPermission({
      method: "GET",
      principal: IYamdbPrincipal.ANONYMOUS,
    }),
    true,
  );
  TestValidator.equals(
    "member writing catalog",
    permission.hasPermission({ method: "POST", principal: user }),
    false,
  );
  TestValidator.equals(
    "admin writing catalog",
    permission.hasPermission({ method: "POST", principal: admin }),
    true,
  );
}
