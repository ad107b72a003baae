import { RandomGenerator } from "@nestia/e2e";

import { YamdbConfirmationCode } from "../../../../src/database/entities/YamdbConfirmationCode";
import { postAuthSignup } from "../../../../src/providers/postAuthSignup";
import { postAuthToken } from "../../../../src/providers/postAuthToken";
import { ITestConnection } from "../../../helpers/ITestConnection";
import { validateHttpStatus } from "../../../helpers/validateHttpStatus";

/**
 * Codes expire after 24 hours.
 *
 * Steps:
 *
 * 1. Sign up.
 * 2. Move the code's creation 25 hours back.
 * 3. Exchange it, expect 401.
 */
export async function test_api_auth_token_expired(
  connection: ITestConnection,
) {
  // 1) sign up
  const username: string = RandomGenerator.alphabets(8);
  await postAuthSignup({
    ...connection,
    body: { username, email: `${username}@example.com` },
  });
  const code: string = connection.mailer.last().text;

  // 2) age the code
  await connection.db.update(
    YamdbConfirmationCode,
    { code },
    { created_at: new Date(Date.now() - 25 * 60 * 60 * 1000) },
  );

  // 3) exchange
  await validateHttpStatus("expired code", 401, () =>
    postAuthToken({
      db: connection.db,
      body: { username, confirmation_code: code },
    }),
  );
}
