import { tags } from "typia";

import { IPage } from "./IPage";

/** Genre of titles, e.g. "Drama". */
export interface IYamdbGenre {
  name: string & tags.MaxLength<256>;
  slug: string & tags.MaxLength<50> & tags.Pattern<"^[-a-zA-Z0-9_]+$">;
}
export namespace IYamdbGenre {
  export interface ICreate {
    name: string & tags.MinLength<1> & tags.MaxLength<256>;
    slug: string & tags.MaxLength<50> & tags.Pattern<"^[-a-zA-Z0-9_]+$">;
  }

  export interface IRequest extends IPage.IRequest {
    /** Substring of the name. */
    search?: string;
  }
}
