import { tags } from "typia";

/**
 * Review of a title.
 *
 * An author writes at most one review per title. Its `score` feeds the
 * title's rating.
 */
export interface IYamdbReview {
  id: number & tags.Type<"uint32">;
  text: string;

  /** Username of the author. */
  author: string;

  score: number & tags.Type<"int32"> & tags.Minimum<1> & tags.Maximum<10>;
  pub_date: string & tags.Format<"date-time">;
}
export namespace IYamdbReview {
  export interface ICreate {
    text: string & tags.MinLength<1>;
    score: number & tags.Type<"int32"> & tags.Minimum<1> & tags.Maximum<10>;
  }

  export interface IUpdate {
    text?: string & tags.MinLength<1>;
    score?: number & tags.Type<"int32"> & tags.Minimum<1> & tags.Maximum<10>;
  }
}
