import { tags } from "typia";

import { IPage } from "./IPage";
import { IYamdbCategory } from "./IYamdbCategory";
import { IYamdbGenre } from "./IYamdbGenre";

/**
 * A rated work.
 *
 * Reading nests the category and genres as objects, while writing refers to
 * them by slug (see {@link IYamdbTitle.ICreate}).
 */
export interface IYamdbTitle {
  id: number & tags.Type<"uint32">;
  name: string & tags.MaxLength<256>;
  year: number & tags.Type<"int32">;

  /**
   * Average score of the title's reviews.
   *
   * `null` while the title has no review at all.
   */
  rating: number | null;

  description: string | null;
  genre: IYamdbGenre[];

  /** `null` once the category has been deleted. */
  category: IYamdbCategory | null;
}
export namespace IYamdbTitle {
  export interface ICreate {
    name: string & tags.MinLength<1> & tags.MaxLength<256>;

    /** Release year, not later than the current one. */
    year: number & tags.Type<"int32">;

    description?: string | null;

    /** Slugs of existing genres. */
    genre: string[];

    /** Slug of an existing category. */
    category: string;
  }

  /** Partial update, omitted properties are left untouched. */
  export interface IUpdate {
    name?: string & tags.MinLength<1> & tags.MaxLength<256>;
    year?: number & tags.Type<"int32">;
    description?: string | null;
    genre?: string[];
    category?: string;
  }

  export interface IRequest extends IPage.IRequest {
    /** Case insensitive substring of the name. */
    name?: string;

    /** Genre slug. */
    genre?: string;

    /** Category slug. */
    category?: string;

    year?: number & tags.Type<"int32">;
  }
}
