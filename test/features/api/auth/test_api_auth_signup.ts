import { RandomGenerator, TestValidator } from "@nestia/e2e";
import typia from "typia";

import { IYamdbAuth } from "../../../../src/api/structures/IYamdbAuth";
import { YamdbConfirmationCode } from "../../../../src/database/entities/YamdbConfirmationCode";
import { YamdbUser } from "../../../../src/database/entities/YamdbUser";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { ConfirmationCodeUtil } from "../../../../src/utils/ConfirmationCodeUtil";
import { ITestConnection } from "../../../helpers/ITestConnection";

/**
 * Self registration.
 *
 * Business context:
 *
 * - Signing up creates an unconfirmed `user` account.
 * - The confirmation code is emailed right away, the body is echoed back.
 *
 * Steps:
 *
 * 1. Sign up with a random username.
 * 2. Validate the stored account.
 * 3. Validate the emailed code against the stored one.
 */
export async function test_api_auth_signup(connection: ITestConnection) {
  // 1) sign up
  const username: string = RandomGenerator.alphabets(8);
  const body = {
    username,
    email: `${username}@example.com`,
  } satisfies IYamdbAuth.ISignup;
  const output: IYamdbAuth.ISignup = await postAuthSignup({
    ...connection,
    body,
  });
  typia.assert(output);
  TestValidator.equals("echoed body", output, body);

  // 2) unconfirmed user
  const user: YamdbUser = await connection.db.findOneByOrFail(YamdbUser, {
    username,
  });
  TestValidator.equals("role", user.role, "user");
  TestValidator.equals("unconfirmed", user.is_confirmed, false);

  // 3) emailed code
  const code: YamdbConfirmationCode = await connection.db.findOneByOrFail(
    YamdbConfirmationCode,
    { user_id: user.id },
  );
  TestValidator.predicate("code format", /^[0-9a-f]{32}$/.test(code.code));
  TestValidator.equals("emails", connection.mailer.sent, [
    {
      subject: ConfirmationCodeUtil.SUBJECT,
      text: code.code,
      from: "admin@yamdb.local",
      to: [body.email],
    },
  ]);
}
