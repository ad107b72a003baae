import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode } from "@nestjs/common";
import { tags } from "typia";
import { DataSource } from "typeorm";

import { IPage } from "../../api/structures/IPage";
import { IYamdbTitle } from "../../api/structures/IYamdbTitle";
import { MemberAuth } from "../../decorators/MemberAuth";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { deleteTitlesTitleId } from "../../providers/deleteTitlesTitleId";
import { getTitles } from "../../providers/getTitles";
import { getTitlesTitleId } from "../../providers/getTitlesTitleId";
import { patchTitlesTitleId } from "../../providers/patchTitlesTitleId";
import { postTitles } from "../../providers/postTitles";
import { putTitlesTitleId } from "../../providers/putTitlesTitleId";

@Controller("/titles")
export class TitlesController {
  public constructor(private readonly dataSource: DataSource) {}

  /**
   * List titles with their rating.
   *
   * @param query Page and filters by name, genre, category and year
   * @tag Titles
   */
  @TypedRoute.Get()
  public async index(
    @TypedQuery() query: IYamdbTitle.IRequest,
  ): Promise<IPage<IYamdbTitle>> {
    return getTitles({ db: this.dataSource.manager, query });
  }

  /** @tag Titles */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedBody() body: IYamdbTitle.ICreate,
  ): Promise<IYamdbTitle> {
    return postTitles({ db: this.dataSource.manager, member, body });
  }

  /** @tag Titles */
  @TypedRoute.Get(":titleId")
  public async at(
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
  ): Promise<IYamdbTitle> {
    return getTitlesTitleId({ db: this.dataSource.manager, titleId });
  }

  /** @tag Titles */
  @TypedRoute.Patch(":titleId")
  public async update(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbTitle.IUpdate,
  ): Promise<IYamdbTitle> {
    return patchTitlesTitleId({
      db: this.dataSource.manager,
      member,
      titleId,
      body,
    });
  }

  /** @tag Titles */
  @TypedRoute.Put(":titleId")
  public async replace(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
    @TypedBody() body: IYamdbTitle.ICreate,
  ): Promise<IYamdbTitle> {
    return putTitlesTitleId({
      db: this.dataSource.manager,
      member,
      titleId,
      body,
    });
  }

  /** @tag Titles */
  @TypedRoute.Delete(":titleId")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("titleId") titleId: number & tags.Type<"uint32">,
  ): Promise<void> {
    return deleteTitlesTitleId({
      db: this.dataSource.manager,
      member,
      titleId,
    });
  }
}
