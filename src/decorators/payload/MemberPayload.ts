import { tags } from "typia";

import { IEYamdbRole } from "../../api/structures/IEYamdbRole";

/**
 * JWT payload of an account, injected by {@link MemberAuth}.
 *
 * - `id` is the yamdb_users.id of the account
 * - `role` mirrors the role at issuance time; permissions are always decided
 *   from the stored role
 */
export interface MemberPayload {
  /** Account ID (yamdb_users.id). */
  id: number & tags.Type<"uint32">;

  username: string;
  role: IEYamdbRole;

  /** Discriminator of the payload type. */
  type: "member";
}
