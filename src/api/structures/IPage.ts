import { tags } from "typia";

/**
 * A page.
 *
 * Collection of records with limit/offset pagination information.
 */
export type IPage<T extends object> = {
  /** Page information. */
  pagination: IPage.IPagination;

  /** List of records. */
  data: T[];
};
export namespace IPage {
  /** Page information. */
  export interface IPagination {
    /** Number of records skipped before this page. */
    offset: number & tags.Type<"uint32">;

    /** Maximum number of records of this page. */
    limit: number & tags.Type<"uint32">;

    /** Total records matching the request. */
    records: number & tags.Type<"uint32">;
  }

  /** Page request data. */
  export interface IRequest {
    /**
     * Limitation of records per a page.
     *
     * Defaults to 10. Values above 100 are clamped to 100.
     */
    limit?: number & tags.Type<"uint32"> & tags.Minimum<1>;

    /** Number of records to skip, defaults to 0. */
    offset?: number & tags.Type<"uint32">;
  }
}
