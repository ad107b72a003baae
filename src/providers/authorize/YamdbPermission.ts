import { ForbiddenException, UnauthorizedException } from "@nestjs/common";

import { IEYamdbRole } from "../../api/structures/IEYamdbRole";
import { IYamdbPrincipal } from "./IYamdbPrincipal";

/**
 * Access rule evaluated before a request touches any record.
 *
 * `hasPermission()` decides on the request alone, `hasObjectPermission()` on
 * the record the request targets. Both must pass for object routes.
 */
export interface IYamdbPermission {
  hasPermission(context: IYamdbPermission.IContext): boolean;
  hasObjectPermission(
    context: IYamdbPermission.IContext,
    target: IYamdbPermission.ITarget,
  ): boolean;
}
export namespace IYamdbPermission {
  export type Method =
    | "GET"
    | "HEAD"
    | "OPTIONS"
    | "POST"
    | "PUT"
    | "PATCH"
    | "DELETE";

  export interface IContext {
    method: Method;
    principal: IYamdbPrincipal;
  }

  /** Record under an object-level decision. */
  export interface ITarget {
    kind: "user" | "category" | "genre" | "title" | "review" | "comment";

    /** Account that wrote the record, `null` for unauthored records. */
    author_id: number | null;
  }
}

export namespace YamdbPermission {
  export const SAFE_METHODS: readonly IYamdbPermission.Method[] = [
    "GET",
    "HEAD",
    "OPTIONS",
  ];

  export const isSafe = (method: IYamdbPermission.Method): boolean =>
    SAFE_METHODS.includes(method);

  /**
   * Reads for everyone, writes for authors, and for moderators on reviews
   * and comments.
   *
   * The object-level decision is ordered: administrators first, then
   * moderators on moderated kinds, then the author or a safe method.
   */
  export const authorOrReadOnly: IYamdbPermission = {
    hasPermission: ({ method, principal }) =>
      isSafe(method) || principal.type === "member",
    hasObjectPermission: ({ method, principal }, target) => {
      if (principal.type === "member") {
        if (principal.role === "admin") return true;
        if (
          MODERATED.includes(target.kind) &&
          principal.role === "moderator"
        )
          return true;
      }
      return (
        (principal.type === "member" && target.author_id === principal.id) ||
        isSafe(method)
      );
    },
  };

  /** Administrators only, whatever the method. */
  export const admin: IYamdbPermission = {
    hasPermission: ({ principal }) =>
      principal.type === "member" && IEYamdbRole.atLeast(principal.role, "admin"),
    hasObjectPermission: () => true,
  };

  /** Reads for everyone, writes for administrators. */
  export const adminOrReadOnly: IYamdbPermission = {
    hasPermission: (context) =>
      isSafe(context.method) || admin.hasPermission(context),
    hasObjectPermission: () => true,
  };

  /** Any authenticated account. */
  export const authenticated: IYamdbPermission = {
    hasPermission: ({ principal }) => principal.type === "member",
    hasObjectPermission: () => true,
  };

  /**
   * Enforce the request-level decision of a permission.
   *
   * @throws {UnauthorizedException} When an anonymous principal is denied
   * @throws {ForbiddenException} When an authenticated principal is denied
   */
  export function assert(
    permission: IYamdbPermission,
    context: IYamdbPermission.IContext,
  ): void {
    if (permission.hasPermission(context) === false) deny(context);
  }

  /**
   * Enforce the object-level decision of a permission on a loaded record.
   *
   * @throws {UnauthorizedException} When an anonymous principal is denied
   * @throws {ForbiddenException} When an authenticated principal is denied
   */
  export function assertObject(
    permission: IYamdbPermission,
    context: IYamdbPermission.IContext,
    target: IYamdbPermission.ITarget,
  ): void {
    if (permission.hasObjectPermission(context, target) === false)
      deny(context);
  }

  const deny = (context: IYamdbPermission.IContext): never => {
    if (context.principal.type === "anonymous")
      throw new UnauthorizedException(
        "Authentication credentials were not provided.",
      );
    throw new ForbiddenException(
      "You do not have permission to perform this action.",
    );
  };
}

const MODERATED: readonly IYamdbPermission.ITarget["kind"][] = [
  "review",
  "comment",
];
