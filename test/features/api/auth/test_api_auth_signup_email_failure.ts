import { TestValidator } from "@nestia/e2e";

import { YamdbConfirmationCode } from "../../../../src/database/entities/YamdbConfirmationCode";
import { YamdbUser } from "../../../../src/database/entities/YamdbUser";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Registration while the mail server is down.
 *
 * Steps:
 *
 * 1. Make every delivery fail.
 * 2. Sign up, expect 500.
 * 3. Neither the account nor its code is kept.
 */
export async function test_api_auth_signup_email_failure(
  connection: ITestConnection,
) {
  // 1) failing mailer
  connection.mailer.failure = new Error("smtp unavailable");

  // 2) sign up
  await validateHttpStatus("delivery failure", 500, () =>
    postAuthSignup({
      ...connection,
      body: { username: "alice", email: "alice@example.com" },
    }),
  );

  // 3) rolled back
  TestValidator.equals("accounts", await connection.db.count(YamdbUser), 0);
  TestValidator.equals(
    "codes",
    await connection.db.count(YamdbConfirmationCode),
    0,
  );
}
