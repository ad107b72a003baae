import { HttpException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { IEYamdbRole } from "../api/structures/IEYamdbRole";
import { IYamdbUser } from "../api/structures/IYamdbUser";
import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { IYamdbMailer } from "../mail/IYamdbMailer";
import { YamdbUserTransformer } from "../transformers/YamdbUserTransformer";
import { ConfirmationCodeUtil } from "../utils/ConfirmationCodeUtil";
import { ExceptionUtil } from "../utils/ExceptionUtil";
import { ValidationUtil } from "../utils/ValidationUtil";
import { YamdbPermission } from "./authorize/YamdbPermission";
import { principalAuthorize } from "./authorize/principalAuthorize";

/**
 * Create an account on behalf of its owner, administrators only.
 *
 * The account starts unconfirmed and receives a confirmation code by email,
 * exactly like a self registration.
 *
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 for non administrators
 * @throws {HttpException} 400 when a field is malformed or already taken
 * @throws {HttpException} 500 when the confirmation email cannot be sent
 */
export async function postUsers(props: {
  db: EntityManager;
  mailer: IYamdbMailer;
  member: MemberPayload | null;
  body: IYamdbUser.ICreate;
}): Promise<IYamdbUser> {
  const principal = await principalAuthorize(props);
  YamdbPermission.assert(YamdbPermission.admin, { method: "POST", principal });

  const { body } = props;
  const username: string = ValidationUtil.username(body.username);
  const email: string = ValidationUtil.email(body.email);
  const role: IEYamdbRole = body.role ?? "user";
  if (IEYamdbRole.is(role) === false)
    throw new HttpException("Bad Request: unknown role", 400);

  try {
    const user: YamdbUser = await props.db.transaction(async (tx) => {
      if (await tx.exists(YamdbUser, { where: { username } }))
        throw new HttpException("Bad Request: username already taken", 400);
      if (await tx.exists(YamdbUser, { where: { email } }))
        throw new HttpException("Bad Request: email already registered", 400);

      const created: YamdbUser = await tx.save(
        tx.create(YamdbUser, {
          username,
          email,
          role,
          is_confirmed: false,
          first_name: ValidationUtil.text("first_name", body.first_name ?? "", {
            max: 150,
          }),
          last_name: ValidationUtil.text("last_name", body.last_name ?? "", {
            max: 150,
          }),
          bio: ValidationUtil.text("bio", body.bio ?? ""),
        }),
      );
      await ConfirmationCodeUtil.issue({
        db: tx,
        mailer: props.mailer,
        user: created,
      });
      return created;
    });
    return YamdbUserTransformer.transform(user);
  } catch (error) {
    if (ExceptionUtil.isUniqueViolation(error))
      throw new HttpException(
        "Bad Request: username or email already registered",
        400,
      );
    throw error;
  }
}
