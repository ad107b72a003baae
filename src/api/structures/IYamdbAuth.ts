import { tags } from "typia";

export namespace IYamdbAuth {
  /**
   * Self registration payload.
   *
   * Creates an unconfirmed account and emails it a confirmation code. The
   * same body is echoed back on success.
   */
  export interface ISignup {
    /**
     * Unique login name.
     *
     * Letters, digits and `@ . + - _` only. The value `me` is reserved for
     * the `/users/me` alias.
     */
    username: string & tags.MinLength<1> & tags.MaxLength<150>;

    /** Unique email address receiving the confirmation code. */
    email: string & tags.Format<"email"> & tags.MaxLength<254>;
  }

  /** Exchange of a confirmation code for an access token. */
  export interface ITokenRequest {
    username: string & tags.MinLength<1>;

    /** Code received by email after {@link ISignup}. */
    confirmation_code: string & tags.MinLength<1>;
  }

  /** Issued access token. */
  export interface IToken {
    /** Bearer token to send in the `Authorization` header. */
    token: string;

    /** Expiration time of the token. */
    expired_at: string & tags.Format<"date-time">;
  }
}
