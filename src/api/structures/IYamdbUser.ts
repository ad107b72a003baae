import { tags } from "typia";

import { IEYamdbRole } from "./IEYamdbRole";
import { IPage } from "./IPage";

/**
 * Account of the platform.
 *
 * Identified by its unique `username` in every URL. The `role` decides the
 * authority tier, see {@link IEYamdbRole}.
 */
export interface IYamdbUser {
  username: string & tags.MaxLength<150>;
  email: string & tags.Format<"email">;
  first_name: string & tags.MaxLength<150>;
  last_name: string & tags.MaxLength<150>;
  bio: string;
  role: IEYamdbRole;
}
export namespace IYamdbUser {
  /** Account creation by an administrator. */
  export interface ICreate {
    username: string & tags.MinLength<1> & tags.MaxLength<150>;
    email: string & tags.Format<"email"> & tags.MaxLength<254>;
    first_name?: string & tags.MaxLength<150>;
    last_name?: string & tags.MaxLength<150>;
    bio?: string;

    /** Defaults to `user`. */
    role?: IEYamdbRole;
  }

  /**
   * Account update.
   *
   * Omitted properties are left untouched. `role` is ignored unless the
   * requester is an administrator.
   */
  export interface IUpdate {
    username?: string & tags.MinLength<1> & tags.MaxLength<150>;
    email?: string & tags.Format<"email"> & tags.MaxLength<254>;
    first_name?: string & tags.MaxLength<150>;
    last_name?: string & tags.MaxLength<150>;
    bio?: string;
    role?: IEYamdbRole;
  }

  export interface IRequest extends IPage.IRequest {
    /** Substring of the username. */
    search?: string;
  }
}
