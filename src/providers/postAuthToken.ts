import { HttpException } from "@nestjs/common";
import jwt from "jsonwebtoken";
import { EntityManager } from "typeorm";

import { MyGlobal } from "../MyGlobal";
import { IYamdbAuth } from "../api/structures/IYamdbAuth";
import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { ConfirmationCodeUtil } from "../utils/ConfirmationCodeUtil";
import { ValidationUtil } from "../utils/ValidationUtil";
import { toISOStringSafe } from "../utils/toISOStringSafe";
import { jwtAuthorize } from "./authorize/jwtAuthorize";

/**
 * Exchange a confirmation code for an access token.
 *
 * The code is single use: a successful exchange consumes it and flags the
 * account as confirmed. Later logins request a new code from
 * `POST /auth/code`.
 *
 * @param props - Request properties
 * @param props.db - Entity manager of the request
 * @param props.body - Username and the emailed confirmation code
 * @returns Signed access token bound to the account ID, username and role
 * @throws {HttpException} 400 when a field is blank
 * @throws {HttpException} 404 when no account has the username
 * @throws {HttpException} 401 when the code is wrong, used or expired
 */
export async function postAuthToken(props: {
  db: EntityManager;
  body: IYamdbAuth.ITokenRequest;
}): Promise<IYamdbAuth.IToken> {
  const username: string = ValidationUtil.text(
    "username",
    props.body.username,
    { min: 1 },
  );
  const code: string = ValidationUtil.text(
    "confirmation_code",
    props.body.confirmation_code,
    { min: 1 },
  );

  return props.db.transaction(async (tx) => {
    const user: YamdbUser | null = await tx.findOne(YamdbUser, {
      where: { username },
    });
    if (user === null) throw new HttpException("Not Found: no such user", 404);

    const accepted: boolean = await ConfirmationCodeUtil.consume({
      db: tx,
      user,
      code,
    });
    if (accepted === false)
      throw new HttpException(
        "Unauthorized: invalid or expired confirmation code",
        401,
      );
    if (user.is_confirmed === false)
      await tx.update(YamdbUser, { id: user.id }, { is_confirmed: true });

    const payload: MemberPayload = {
      id: user.id,
      username: user.username,
      role: user.role,
      type: "member",
    };
    const expiresIn: number = MyGlobal.env.JWT_EXPIRES_IN_SECONDS;
    const token: string = jwt.sign(payload, MyGlobal.env.JWT_SECRET_KEY, {
      expiresIn,
      issuer: jwtAuthorize.ISSUER,
    });
    return {
      token,
      expired_at: toISOStringSafe(new Date(Date.now() + expiresIn * 1000)),
    };
  });
}
