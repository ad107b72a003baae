import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode, Inject } from "@nestjs/common";
import { DataSource } from "typeorm";

import { IPage } from "../../api/structures/IPage";
import { IYamdbUser } from "../../api/structures/IYamdbUser";
import { MemberAuth } from "../../decorators/MemberAuth";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { IYamdbMailer } from "../../mail/IYamdbMailer";
import { deleteUsersUsername } from "../../providers/deleteUsersUsername";
import { getUsers } from "../../providers/getUsers";
import { getUsersUsername } from "../../providers/getUsersUsername";
import { patchUsersUsername } from "../../providers/patchUsersUsername";
import { postUsers } from "../../providers/postUsers";
import { putUsersUsername } from "../../providers/putUsersUsername";

/**
 * Accounts, administered by administrators.
 *
 * Every account reaches its own through the `me` username.
 */
@Controller("/users")
export class UsersController {
  public constructor(
    private readonly dataSource: DataSource,
    @Inject(IYamdbMailer.TOKEN) private readonly mailer: IYamdbMailer,
  ) {}

  /**
   * @param query Page and username search
   * @tag Users
   */
  @TypedRoute.Get()
  public async index(
    @MemberAuth() member: MemberPayload | null,
    @TypedQuery() query: IYamdbUser.IRequest,
  ): Promise<IPage<IYamdbUser>> {
    return getUsers({ db: this.dataSource.manager, member, query });
  }

  /**
   * Create an account and email its confirmation code.
   *
   * @tag Users
   */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedBody() body: IYamdbUser.ICreate,
  ): Promise<IYamdbUser> {
    return postUsers({
      db: this.dataSource.manager,
      mailer: this.mailer,
      member,
      body,
    });
  }

  /**
   * @param username Username, or `me` for the requester
   * @tag Users
   */
  @TypedRoute.Get(":username")
  public async at(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("username") username: string,
  ): Promise<IYamdbUser> {
    return getUsersUsername({ db: this.dataSource.manager, member, username });
  }

  /**
   * @param username Username, or `me` for the requester
   * @tag Users
   */
  @TypedRoute.Patch(":username")
  public async update(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("username") username: string,
    @TypedBody() body: IYamdbUser.IUpdate,
  ): Promise<IYamdbUser> {
    return patchUsersUsername({
      db: this.dataSource.manager,
      member,
      username,
      body,
    });
  }

  /**
   * @param username Username, or `me` for the requester
   * @tag Users
   */
  @TypedRoute.Put(":username")
  public async replace(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("username") username: string,
    @TypedBody() body: IYamdbUser.ICreate,
  ): Promise<IYamdbUser> {
    return putUsersUsername({
      db: this.dataSource.manager,
      member,
      username,
      body,
    });
  }

  /**
   * @param username Username; `me` is refused with 405
   * @tag Users
   */
  @TypedRoute.Delete(":username")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("username") username: string,
  ): Promise<void> {
    return deleteUsersUsername({
      db: this.dataSource.manager,
      member,
      username,
    });
  }
}
