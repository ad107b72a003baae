import { HttpException } from "@nestjs/common";
import { EntityManager } from "typeorm";

import { YamdbUser } from "../database/entities/YamdbUser";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { IYamdbPrincipal } from "../providers/authorize/IYamdbPrincipal";
import {
  IYamdbPermission,
  YamdbPermission,
} from "../providers/authorize/YamdbPermission";
import { principalAuthorize } from "../providers/authorize/principalAuthorize";
import { ExceptionUtil } from "./ExceptionUtil";
import { ValidationUtil } from "./ValidationUtil";

export namespace UserTargetUtil {
  export interface ITarget {
    principal: IYamdbPrincipal.IMember;
    user: YamdbUser;

    /** Whether the route addressed the `me` alias. */
    self: boolean;
  }

  /**
   * Resolve the account addressed by `/users/{username}`.
   *
   * The `me` alias is open to every authenticated account and refuses
   * `DELETE`; any other username is reserved to administrators.
   *
   * @throws {HttpException} 401 for anonymous requests
   * @throws {HttpException} 403 when a non administrator addresses another
   *   account
   * @throws {HttpException} 405 when deleting `me`
   * @throws {HttpException} 404 when the username is unknown
   */
  export async function resolve(props: {
    db: EntityManager;
    member: MemberPayload | null;
    username: string;
    method: IYamdbPermission.Method;
  }): Promise<ITarget> {
    const principal: IYamdbPrincipal = await principalAuthorize(props);
    const self: boolean = props.username === ValidationUtil.ME;
    YamdbPermission.assert(
      self ? YamdbPermission.authenticated : YamdbPermission.admin,
      { method: props.method, principal },
    );
    const actor: IYamdbPrincipal.IMember = IYamdbPrincipal.member(principal);
    if (self && props.method === "DELETE")
      throw ExceptionUtil.methodNotAllowed(props.method);

    const user: YamdbUser | null = await props.db.findOne(YamdbUser, {
      where: self ? { id: actor.id } : { username: props.username },
    });
    if (user === null) throw new HttpException("Not Found", 404);
    return { principal: actor, user, self };
  }
}
