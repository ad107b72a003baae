import { SwaggerCustomizer } from "@nestia/core";
import { ExecutionContext, createParamDecorator } from "@nestjs/common";
import { Singleton } from "tstl";

import { memberAuthorize } from "../providers/authorize/memberAuthorize";

/**
 * Parameter decorator injecting the {@link MemberPayload} of the Bearer token.
 *
 * Requests without an `Authorization` header receive `null`, so that public
 * routes can still read the requester. Malformed or expired tokens are
 * rejected with 401.
 *
 * Usage: controllerMethod(@MemberAuth() member: MemberPayload | null)
 */
export const MemberAuth =
  (): ParameterDecorator =>
  (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number,
  ): void => {
    if (propertyKey !== undefined)
      SwaggerCustomizer((props) => {
        props.route.security ??= [];
        props.route.security.push({ bearer: [] });
      })(
        target,
        propertyKey,
        Object.getOwnPropertyDescriptor(target, propertyKey) ?? {},
      );
    singleton.get()(target, propertyKey, parameterIndex);
  };

const singleton = new Singleton(() =>
  createParamDecorator((_0: unknown, ctx: ExecutionContext) =>
    memberAuthorize(
      ctx
        .switchToHttp()
        .getRequest<{ headers: { authorization?: string } }>(),
    ),
  )(),
);
