import { UnauthorizedException } from "@nestjs/common";

import { IEYamdbRole } from "../../api/structures/IEYamdbRole";

/**
 * Actor of a request, resolved against the stored account.
 */
export type IYamdbPrincipal = IYamdbPrincipal.IAnonymous | IYamdbPrincipal.IMember;
export namespace IYamdbPrincipal {
  export interface IAnonymous {
    type: "anonymous";
  }

  export interface IMember {
    type: "member";
    id: number;
    username: string;
    role: IEYamdbRole;
  }

  export const ANONYMOUS: IAnonymous = { type: "anonymous" };

  /**
   * Narrow to the authenticated member.
   *
   * @throws {UnauthorizedException} For anonymous principals
   */
  export const member = (principal: IYamdbPrincipal): IMember => {
    if (principal.type === "anonymous")
      throw new UnauthorizedException(
        "Authentication credentials were not provided.",
      );
    return principal;
  };
}
