import { TestValidator } from "@nestia/e2e";

import { YamdbUser } from "../../../../src/database/entities/YamdbUser";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Registration with malformed fields.
 *
 * Usernames take letters, digits and `@ . + - _` only, `me` is reserved,
 * and the email must be an address.
 *
 * Steps:
 *
 * 1. Try malformed, reserved and empty usernames.
 * 2. Try a malformed email.
 * 3. Nothing is stored nor sent.
 */
export async function test_api_auth_signup_invalid(
  connection: ITestConnection,
) {
  // 1) usernames
  for (const username of ["bad name!", "me", ""])
    await validateHttpStatus(`username ${JSON.stringify(username)}`, 400, () =>
      postAuthSignup({
        ...connection,
        body: { username, email: "alice@example.com" },
      }),
    );

  // 2) email
  await validateHttpStatus("malformed email", 400, () =>
    postAuthSignup({
      ...connection,
      body: { username: "alice", email: "not-an-email" },
    }),
  );

  // 3) no side effect
  TestValidator.equals("emails sent", connection.mailer.sent.length, 0);
  TestValidator.equals("accounts", await connection.db.count(YamdbUser), 0);
}
