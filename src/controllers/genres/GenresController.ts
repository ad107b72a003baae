import { TypedBody, TypedParam, TypedQuery, TypedRoute } from "@nestia/core";
import { Controller, HttpCode } from "@nestjs/common";
import { DataSource } from "typeorm";

import { IPage } from "../../api/structures/IPage";
import { IYamdbGenre } from "../../api/structures/IYamdbGenre";
import { MemberAuth } from "../../decorators/MemberAuth";
import { MemberPayload } from "../../decorators/payload/MemberPayload";
import { deleteGenresSlug } from "../../providers/deleteGenresSlug";
import { getGenres } from "../../providers/getGenres";
import { getGenresSlug } from "../../providers/getGenresSlug";
import { patchGenresSlug } from "../../providers/patchGenresSlug";
import { postGenres } from "../../providers/postGenres";
import { putGenresSlug } from "../../providers/putGenresSlug";

@Controller("/genres")
export class GenresController {
  public constructor(private readonly dataSource: DataSource) {}

  /** @tag Genres */
  @TypedRoute.Get()
  public async index(
    @TypedQuery() query: IYamdbGenre.IRequest,
  ): Promise<IPage<IYamdbGenre>> {
    return getGenres({ db: this.dataSource.manager, query });
  }

  /** @tag Genres */
  @TypedRoute.Post()
  public async create(
    @MemberAuth() member: MemberPayload | null,
    @TypedBody() body: IYamdbGenre.ICreate,
  ): Promise<IYamdbGenre> {
    return postGenres({ db: this.dataSource.manager, member, body });
  }

  /** @tag Genres */
  @TypedRoute.Delete(":slug")
  @HttpCode(204)
  public async erase(
    @MemberAuth() member: MemberPayload | null,
    @TypedParam("slug") slug: string,
  ): Promise<void> {
    return deleteGenresSlug({ db: this.dataSource.manager, member, slug });
  }

  /**
   * Always 405.
   *
   * @tag Genres
   */
  @TypedRoute.Get(":slug")
  public async at(): Promise<void> {
    return getGenresSlug();
  }

  /**
   * Always 405.
   *
   * @tag Genres
   */
  @TypedRoute.Put(":slug")
  public async replace(): Promise<void> {
    return putGenresSlug();
  }

  /**
   * Always 405.
   *
   * @tag Genres
   */
  @TypedRoute.Patch(":slug")
  public async update(): Promise<void> {
    return patchGenresSlug();
  }
}
