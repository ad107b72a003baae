import { HttpException, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { IYamdbAuth } from "../api/structures/IYamdbAuth";
import { YamdbUser } from "../database/entities/YamdbUser";
import { IYamdbMailer } from "../mail/IYamdbMailer";
import { ConfirmationCodeUtil } from "../utils/ConfirmationCodeUtil";
import { ExceptionUtil } from "../utils/ExceptionUtil";
import { ValidationUtil } from "../utils/ValidationUtil";

/**
 * Register an unconfirmed account and email its confirmation code.
 *
 * The account, its code and the delivery form one transaction: when the
 * email cannot be sent, nothing is stored and the caller may retry.
 *
 * Public endpoint (no authentication required).
 *
 * @param props - Request properties
 * @param props.db - Entity manager of the request
 * @param props.mailer - Outgoing email channel
 * @param props.body - Username and email of the new account
 * @returns The registered username and email
 * @throws {HttpException} 400 when a field is malformed or already taken
 * @throws {HttpException} 500 when the confirmation email cannot be sent
 */
export async function postAuthSignup(props: {
  db: EntityManager;
  mailer: IYamdbMailer;
  body: IYamdbAuth.ISignup;
}): Promise<IYamdbAuth.ISignup> {
  const username: string = ValidationUtil.username(props.body.username);
  const email: string = ValidationUtil.email(props.body.email);

  try {
    await props.db.transaction(async (tx) => {
      if (await tx.exists(YamdbUser, { where: { username } }))
        throw new HttpException("Bad Request: username already taken", 400);
      if (await tx.exists(YamdbUser, { where: { email } }))
        throw new HttpException("Bad Request: email already registered", 400);

      const user: YamdbUser = await tx.save(
        tx.create(YamdbUser, {
          username,
          email,
          role: "user",
          is_confirmed: false,
        }),
      );
      await ConfirmationCodeUtil.issue({ db: tx, mailer: props.mailer, user });
    });
  } catch (error) {
    if (ExceptionUtil.isUniqueViolation(error))
      throw new HttpException(
        "Bad Request: username or email already registered",
        400,
      );
    throw error;
  }

  logger.log(`Registered ${username}, confirmation code sent to ${email}`);
  return { username, email };
}

const logger: Logger = new Logger("Signup");
