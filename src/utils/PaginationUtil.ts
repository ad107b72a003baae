import { HttpException } from "@nestjs/common";

import { IPage } from "../api/structures/IPage";

export namespace PaginationUtil {
  export const DEFAULT_LIMIT = 10;
  export const MAX_LIMIT = 100;

  export interface IWindow {
    offset: number;
    limit: number;
  }

  /**
   * Normalize limit/offset of a page request.
   *
   * Limits above {@link MAX_LIMIT} are clamped.
   *
   * @throws {HttpException} 400 when limit or offset is not a non-negative
   *   integer, or limit is zero
   */
  export function window(input: IPage.IRequest): IWindow {
    const limit: number = input.limit ?? DEFAULT_LIMIT;
    const offset: number = input.offset ?? 0;
    if (Number.isInteger(limit) === false || limit < 1)
      throw new HttpException(
        "Bad Request: limit must be a positive integer",
        400,
      );
    if (Number.isInteger(offset) === false || offset < 0)
      throw new HttpException(
        "Bad Request: offset must be a non-negative integer",
        400,
      );
    return { offset, limit: Math.min(limit, MAX_LIMIT) };
  }

  export function paginate<T extends object>(props: {
    window: IWindow;
    records: number;
    data: T[];
  }): IPage<T> {
    return {
      pagination: {
        offset: props.window.offset,
        limit: props.window.limit,
        records: props.records,
      },
      data: props.data,
    };
  }
}
