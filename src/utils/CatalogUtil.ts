import { HttpException } from "@nestjs/common";
import { EntityManager, EntityTarget } from "typeorm";

import { IPage } from "../api/structures/IPage";
import { IYamdbCategory } from "../api/structures/IYamdbCategory";
import { YamdbCatalogEntry } from "../database/entities/YamdbCatalogEntry";
import { MemberPayload } from "../decorators/payload/MemberPayload";
import { YamdbPermission } from "../providers/authorize/YamdbPermission";
import { principalAuthorize } from "../providers/authorize/principalAuthorize";
import { YamdbCatalogTransformer } from "../transformers/YamdbCatalogTransformer";
import { ExceptionUtil } from "./ExceptionUtil";
import { PaginationUtil } from "./PaginationUtil";
import { SearchUtil } from "./SearchUtil";
import { ValidationUtil } from "./ValidationUtil";

/**
 * Operations shared by the category and genre catalogs.
 *
 * Reads are public, writes reserved to administrators. Entries are only
 * listed, created and deleted: reading or updating one entry is refused.
 */
export namespace CatalogUtil {
  export async function index(props: {
    db: EntityManager;
    target: EntityTarget<YamdbCatalogEntry>;
    query: IPage.IRequest & { search?: string };
  }): Promise<IPage<IYamdbCategory>> {
    const window = PaginationUtil.window(props.query);
    const search: string | undefined = props.query.search?.trim();

    const query = props.db
      .createQueryBuilder(props.target, "entry")
      .orderBy("entry.name", "ASC")
      .addOrderBy("entry.id", "ASC")
      .skip(window.offset)
      .take(window.limit);
    if (search !== undefined && search.length !== 0)
      query.where(`LOWER(entry.name) LIKE :search ${SearchUtil.ESCAPE}`, {
        search: SearchUtil.contains(search),
      });

    const [entries, records] = await query.getManyAndCount();
    return PaginationUtil.paginate({
      window,
      records,
      data: entries.map(YamdbCatalogTransformer.transform),
    });
  }

  /**
   * @throws {HttpException} 401 for anonymous requests
   * @throws {HttpException} 403 for non administrators
   * @throws {HttpException} 400 when a field is malformed or the slug taken
   */
  export async function create(props: {
    db: EntityManager;
    target: EntityTarget<YamdbCatalogEntry>;
    member: MemberPayload | null;
    body: IYamdbCategory.ICreate;
  }): Promise<IYamdbCategory> {
    const principal = await principalAuthorize(props);
    YamdbPermission.assert(YamdbPermission.adminOrReadOnly, {
      method: "POST",
      principal,
    });

    const name: string = ValidationUtil.text("name", props.body.name, {
      min: 1,
      max: 256,
    });
    const slug: string = ValidationUtil.slug(props.body.slug);
    if (await props.db.exists(props.target, { where: { slug } }))
      throw new HttpException("Bad Request: slug already exists", 400);

    try {
      const entry: YamdbCatalogEntry = await props.db.save(
        props.db.create(props.target, { name, slug }),
      );
      return YamdbCatalogTransformer.transform(entry);
    } catch (error) {
      if (ExceptionUtil.isUniqueViolation(error))
        throw new HttpException("Bad Request: slug already exists", 400);
      throw error;
    }
  }

  /**
   * Titles of a deleted category keep existing without category; titles of
   * a deleted genre only lose that genre.
   *
   * @throws {HttpException} 401 for anonymous requests
   * @throws {HttpException} 403 for non administrators
   * @throws {HttpException} 404 when the slug is unknown
   */
  export async function erase(props: {
    db: EntityManager;
    target: EntityTarget<YamdbCatalogEntry>;
    member: MemberPayload | null;
    slug: string;
  }): Promise<void> {
    const principal = await principalAuthorize(props);
    YamdbPermission.assert(YamdbPermission.adminOrReadOnly, {
      method: "DELETE",
      principal,
    });

    const entry: YamdbCatalogEntry | null = await props.db.findOne(
      props.target,
      { where: { slug: props.slug } },
    );
    if (entry === null) throw new HttpException("Not Found", 404);
    await props.db.delete(props.target, { id: entry.id });
  }

  /**
   * Single entries cannot be read nor updated, even by administrators.
   *
   * @throws {HttpException} 405 always
   */
  export function refuse(method: "GET" | "PUT" | "PATCH"): never {
    throw ExceptionUtil.methodNotAllowed(method);
  }
}
