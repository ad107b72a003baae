import { HttpException } from "@nestjs/common";
import { EntityManager, In } from "typeorm";

import { YamdbCategory } from "../database/entities/YamdbCategory";
import { YamdbGenre } from "../database/entities/YamdbGenre";
import { YamdbTitle } from "../database/entities/YamdbTitle";
import { ValidationUtil } from "./ValidationUtil";

export namespace TitleUtil {
  /**
   * Load a title with its category and genres.
   *
   * @throws {HttpException} 404 when the title does not exist
   */
  export async function find(
    db: EntityManager,
    id: number,
  ): Promise<YamdbTitle> {
    const title: YamdbTitle | null = await db.findOne(YamdbTitle, {
      where: { id },
      relations: { category: true, genres: true },
    });
    if (title === null) throw new HttpException("Not Found", 404);
    return title;
  }

  /** @throws {HttpException} 400 when the year is in the future */
  export function year(value: unknown): number {
    return ValidationUtil.integer("year", value, {
      max: new Date().getFullYear(),
    });
  }

  export function description(value: unknown): string | null {
    if (value === null) return null;
    const text: string = ValidationUtil.text("description", value);
    return text.length === 0 ? null : text;
  }

  /** @throws {HttpException} 400 when the slug names no category */
  export async function category(
    db: EntityManager,
    slug: unknown,
  ): Promise<YamdbCategory> {
    const found: YamdbCategory | null = await db.findOne(YamdbCategory, {
      where: { slug: ValidationUtil.slug(slug) },
    });
    if (found === null)
      throw new HttpException(
        `Bad Request: category "${String(slug)}" does not exist`,
        400,
      );
    return found;
  }

  /**
   * Resolve genre slugs, duplicates collapsed.
   *
   * @throws {HttpException} 400 when a slug names no genre
   */
  export async function genres(
    db: EntityManager,
    slugs: unknown,
  ): Promise<YamdbGenre[]> {
    if (!Array.isArray(slugs))
      throw new HttpException("Bad Request: genre must be a list", 400);
    const unique: string[] = [
      ...new Set(slugs.map((s: unknown) => ValidationUtil.slug(s))),
    ];
    if (unique.length === 0) return [];

    const found: YamdbGenre[] = await db.find(YamdbGenre, {
      where: { slug: In(unique) },
    });
    const missing: string | undefined = unique.find(
      (slug) => found.some((g) => g.slug === slug) === false,
    );
    if (missing !== undefined)
      throw new HttpException(
        `Bad Request: genre "${missing}" does not exist`,
        400,
      );
    return found;
  }
}
