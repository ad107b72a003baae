import { tags } from "typia";

/** Comment on a review. */
export interface IYamdbComment {
  id: number & tags.Type<"uint32">;
  text: string;

  /** Username of the author. */
  author: string;

  pub_date: string & tags.Format<"date-time">;
}
export namespace IYamdbComment {
  export interface ICreate {
    text: string & tags.MinLength<1>;
  }

  export interface IUpdate {
    text?: string & tags.MinLength<1>;
  }
}
