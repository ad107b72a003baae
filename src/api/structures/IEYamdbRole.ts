/**
 * Authority tier of an account.
 *
 * Ordered from the least to the most privileged one: `user` < `moderator` <
 * `admin`. Compare tiers through {@link IEYamdbRole.atLeast} instead of
 * chaining equality checks.
 */
export type IEYamdbRole = "user" | "moderator" | "admin";
export namespace IEYamdbRole {
  /** Every role, ascending by authority. */
  export const VALUES = ["user", "moderator", "admin"] as const;

  export const rank = (role: IEYamdbRole): number => VALUES.indexOf(role);

  export const atLeast = (role: IEYamdbRole, minimum: IEYamdbRole): boolean =>
    rank(role) >= rank(minimum);

  export const is = (value: unknown): value is IEYamdbRole =>
    VALUES.some((role) => role === value);
}
