import { IYamdbComment } from "../api/structures/IYamdbComment";
import { YamdbComment } from "../database/entities/YamdbComment";
import { toISOStringSafe } from "../utils/toISOStringSafe";

export namespace YamdbCommentTransformer {
  /** Requires the `author` relation to be loaded. */
  export const transform = (comment: YamdbComment): IYamdbComment => ({
    id: comment.id,
    text: comment.text,
    author: comment.author.username,
    pub_date: toISOStringSafe(comment.created_at),
  });
}
