import { RandomGenerator, TestValidator } from "@nestia/e2e";
import typia from "typia";

import { postAuthCode } from "../../../../src/providers/postAuthCode";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { postAuthToken } from "../../../../src/providers/postAuthToken";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Re-issue of a confirmation code.
 *
 * Business context:
 *
 * - Members log in again by requesting a new code for their username and
 *   email.
 * - Only the latest code of an account is accepted.
 *
 * Steps:
 *
 * 1. Sign up and keep the first code.
 * 2. Request a new code.
 * 3. The first code is rejected, the second one accepted.
 */
export async function test_api_auth_code_reissue(connection: ITestConnection) {
  // 1) sign up
  const username: string = RandomGenerator.alphabets(8);
  const email: string = `${username}@example.com`;
  await postAuthSignup({ ...connection, body: { username, email } });
  const first: string = connection.mailer.last().text;

  // 2) new code
  await postAuthCode({ ...connection, body: { username, email } });
  const second: string = connection.mailer.last().text;
  TestValidator.predicate("new code", second !== first);

  // 3) superseded
  await validateHttpStatus("superseded code", 401, () =>
    postAuthToken({
      db: connection.db,
      body: { username, confirmation_code: first },
    }),
  );
  typia.assert(
    await postAuthToken({
      db: connection.db,
      body: { username, confirmation_code: second },
    }),
  );
}
