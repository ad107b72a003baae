import { RandomGenerator, TestValidator } from "@nestia/e2e";

import { postAuthCode } from "../../../../src/providers/postAuthCode";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * A code is never re-issued for an email that is not the account's.
 *
 * Steps:
 *
 * 1. Sign up.
 * 2. Request a code with another email, expect 400 and no email.
 */
export async function test_api_auth_code_mismatch(
  connection: ITestConnection,
) {
  // 1) sign up
  const username: string = RandomGenerator.alphabets(8);
  await postAuthSignup({
    ...connection,
    body: { username, email: `${username}@example.com` },
  });

  // 2) another email
  await validateHttpStatus("mismatching email", 400, () =>
    postAuthCode({
      ...connection,
      body: { username, email: "mallory@example.com" },
    }),
  );
  TestValidator.equals("emails sent", connection.mailer.sent.length, 1);
}
