import { HttpException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { IYamdbAuth } from "../api/structures/IYamdbAuth";
import { YamdbUser } from "../database/entities/YamdbUser";
import { IYamdbMailer } from "../mail/IYamdbMailer";
import { ConfirmationCodeUtil } from "../utils/ConfirmationCodeUtil";
import { ValidationUtil } from "../utils/ValidationUtil";

/**
 * Email a fresh confirmation code to an existing account.
 *
 * Codes are single use, so confirmed accounts come back here to log in
 * again. Issuing a code supersedes every previous one.
 *
 * @param props - Request properties
 * @param props.db - Entity manager of the request
 * @param props.mailer - Outgoing email channel
 * @param props.body - Username and email, both matching the same account
 * @returns The username and email the code was sent for
 * @throws {HttpException} 400 when no account has both the username and
 *   the email
 * @throws {HttpException} 500 when the confirmation email cannot be sent
 */
export async function postAuthCode(props: {
  db: EntityManager;
  mailer: IYamdbMailer;
  body: IYamdbAuth.ISignup;
}): Promise<IYamdbAuth.ISignup> {
  const username: string = ValidationUtil.text(
    "username",
    props.body.username,
    { min: 1 },
  );
  const email: string = ValidationUtil.text("email", props.body.email, {
    min: 1,
  });

  await props.db.transaction(async (tx) => {
    const user: YamdbUser | null = await tx.findOne(YamdbUser, {
      where: { username, email },
    });
    if (user === null)
      throw new HttpException(
        "Bad Request: no account matches the username and email",
        400,
      );
    await ConfirmationCodeUtil.issue({ db: tx, mailer: props.mailer, user });
  });
  return { username, email };
}
