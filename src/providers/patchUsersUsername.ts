import { HttpException } from "@nestjs/common";
import { EntityManager, Not } from "typeorm";

import { IEYamdbRole } from "../api/structures/IEYamdbRole";
import { IYamdbUser } from "../api/structures/IYamdbUser";
import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbUserTransformer } from "../transformers/YamdbUserTransformer";
import { ExceptionUtil } from "../utils/ExceptionUtil";
import { UserTargetUtil } from "../utils/UserTargetUtil";
import { ValidationUtil } from "../utils/ValidationUtil";
import { IYamdbPermission } from "./authorize/YamdbPermission";

/**
 * Update an account by username, or the requester's own through `me`.
 *
 * Omitted properties are left untouched. The role only changes when an
 * administrator sends it; other accounts cannot promote themselves.
 *
 * @param props - Request properties
 * @param props.db - Entity manager of the request
 * @param props.member - Authenticated account, `null` when anonymous
 * @param props.username - Target username or `me`
 * @param props.body - Properties to change
 * @returns The updated account
 * @throws {HttpException} 401 for anonymous requests
 * @throws {HttpException} 403 when a non administrator targets another
 *   account
 * @throws {HttpException} 404 when the username is unknown
 * @throws {HttpException} 400 when a field is malformed or already taken
 */
export async function patchUsersUsername(props: {
  db: EntityManager;
  member: MemberPayload | null;
  username: string;
  body: IYamdbUser.IUpdate;
  method?: IYamdbPermission.Method;
}): Promise<IYamdbUser> {
  const { principal, user } = await UserTargetUtil.resolve({
    ...props,
    method: props.method ?? "PATCH",
  });
  const { body } = props;
  const replace: boolean = props.method === "PUT";

  const changes: Partial<
    Pick<
      YamdbUser,
      "username" | "email" | "first_name" | "last_name" | "bio" | "role"
    >
  > = {};
  if (body.username !== undefined || replace)
    changes.username = ValidationUtil.username(body.username);
  if (body.email !== undefined || replace)
    changes.email = ValidationUtil.email(body.email);
  if (body.first_name !== undefined)
    changes.first_name = ValidationUtil.text("first_name", body.first_name, {
      max: 150,
    });
  if (body.last_name !== undefined)
    changes.last_name = ValidationUtil.text("last_name", body.last_name, {
      max: 150,
    });
  if (body.bio !== undefined)
    changes.bio = ValidationUtil.text("bio", body.bio);
  if (body.role !== undefined && principal.role === "admin") {
    if (IEYamdbRole.is(body.role) === false)
      throw new HttpException("Bad Request: unknown role", 400);
    changes.role = body.role;
  }

  if (
    changes.username !== undefined &&
    (await props.db.exists(YamdbUser, {
      where: { username: changes.username, id: Not(user.id) },
    }))
  )
    throw new HttpException("Bad Request: username already taken", 400);
  if (
    changes.email !== undefined &&
    (await props.db.exists(YamdbUser, {
      where: { email: changes.email, id: Not(user.id) },
    }))
  )
    throw new HttpException("Bad Request: email already registered", 400);

  if (Object.keys(changes).length !== 0)
    try {
      await props.db.update(YamdbUser, { id: user.id }, changes);
    } catch (error) {
      if (ExceptionUtil.isUniqueViolation(error))
        throw new HttpException(
          "Bad Request: username or email already registered",
          400,
        );
      throw error;
    }
  return YamdbUserTransformer.transform({ ...user, ...changes });
}
