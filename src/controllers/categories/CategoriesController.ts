import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode } from "@nestjs/common";
import { DataSource } from "typeorm";

import { IPage } from "../../api/structures/IPage";
import { IYamdbCategory } from "../../api/structures/IYamdbCategory";
import { MemberAuth } from "../../decorators/MemberAuth";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { deleteCategoriesSlug } from "../../providers/deleteCategoriesSlug";
import { getCategories } from "../../providers/getCategories";
import { getCategoriesSlug } from "../../providers/getCategoriesSlug";
import { patchCategoriesSlug } from "../../providers/patchCategoriesSlug";
import { postCategories } from "../../providers/postCategories";
import { putCategoriesSlug } from "../../providers/putCategoriesSlug";

@Controller("/categories")
export class CategoriesController {
  public constructor(private readonly dataSource: DataSource) {}

  /** @tag Categories */
  @TypedRoute.Get()
  public async index(
    @TypedQuery() query: IYamdbCategory.IRequest,
  ): Promise<IPage<IYamdbCategory>> {
    return getCategories({ db: this.dataSource.manager, query });
  }

  /** @tag Categories */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedBody() body: IYamdbCategory.ICreate,
  ): Promise<IYamdbCategory> {
    return postCategories({ db: this.dataSource.manager, member, body });
  }

  /** @tag Categories */
  @TypedRoute.Delete(":slug")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("slug") slug: string,
  ): Promise<void> {
    return deleteCategoriesSlug({ db: this.dataSource.manager, member, slug });
  }

  /**
   * Always 405.
   *
   * @tag Categories
   */
  @TypedRoute.Get(":slug")
  public async at(): Promise<void> {
    return getCategoriesSlug();
  }

  /**
   * Always 405.
   *
   * @tag Categories
   */
  @TypedRoute.Put(":slug")
  public async replace(): Promise<void> {
    return putCategoriesSlug();
  }

  /**
   * Always 405.
   *
   * @tag Categories
   */
  @TypedRoute.Patch(":slug")
  public async update(): Promise<void> {
    return patchCategoriesSlug();
  }
}
