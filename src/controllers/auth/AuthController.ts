import { TypedBody, TypedRoute } from "@nestia/core";
import { Controller, HttpCode, Inject } from "@nestjs/common";
import { DataSource } from "typeorm";

import { IYamdbAuth } from "../../api/structures/IYamdbAuth";
import { IYamdbMailer } from "../../mail/IYamdbMailer";
import { postAuthCode } from "../../providers/postAuthCode";
import { postAuthSignup } from "../../providers/postAuthSignup";
import { postAuthToken } from "../../providers/postAuthToken";

@Controller("/auth")
export class AuthController {
  public constructor(
    private readonly dataSource: DataSource,
    @Inject(IYamdbMailer.TOKEN) private readonly mailer: IYamdbMailer,
  ) {}

  /**
   * Register an account and email its confirmation code.
   *
   * @param body Username and email of the new account
   * @returns The registered username and email
   * @tag Auth
   */
  @TypedRoute.Post("signup")
  @HttpCode(200)
  public async signup(
    @TypedBody() body: IYamdbAuth.ISignup,
  ): Promise<IYamdbAuth.ISignup> {
    return postAuthSignup({
      db: this.dataSource.manager,
      mailer: this.mailer,
      body,
    });
  }

  /**
   * Email a new confirmation code to a registered account.
   *
   * @param body Username and email of the account
   * @tag Auth
   */
  @TypedRoute.Post("code")
  @HttpCode(200)
  public async code(
    @TypedBody() body: IYamdbAuth.ISignup,
  ): Promise<IYamdbAuth.ISignup> {
    return postAuthCode({
      db: this.dataSource.manager,
      mailer: this.mailer,
      body,
    });
  }

  /**
   * Exchange a confirmation code for an access token.
   *
   * @param body Username and confirmation code
   * @returns Bearer token
   * @tag Auth
   */
  @TypedRoute.Post("token")
  @HttpCode(200)
  public async token(
    @TypedBody() body: IYamdbAuth.ITokenRequest,
  ): Promise<IYamdbAuth.IToken> {
    return postAuthToken({ db: this.dataSource.manager, body });
  }
}
