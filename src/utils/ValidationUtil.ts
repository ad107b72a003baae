import { HttpException } from "@nestjs/common";

/**
 * Business validation of request bodies.
 *
 * Every function throws a 400 {@link HttpException} naming the field, and
 * returns the normalized value otherwise. Strings are trimmed.
 */
export namespace ValidationUtil {
  export function text(
    field: string,
    value: unknown,
    options: { min?: number; max?: number } = {},
  ): string {
    if (typeof value !== "string")
      throw new HttpException(`Bad Request: ${field} must be a string`, 400);

    const trimmed: string = value.trim();
    const min: number = options.min ?? 0;
    if (trimmed.length < min)
      throw new HttpException(
        min === 1
          ? `Bad Request: ${field} must not be blank`
          : `Bad Request: ${field} must be at least ${min} characters`,
        400,
      );
    if (options.max !== undefined && trimmed.length > options.max)
      throw new HttpException(
        `Bad Request: ${field} must be at most ${options.max} characters`,
        400,
      );
    return trimmed;
  }

  export function integer(
    field: string,
    value: unknown,
    options: { min?: number; max?: number } = {},
  ): number {
    if (typeof value !== "number" || Number.isInteger(value) === false)
      throw new HttpException(`Bad Request: ${field} must be an integer`, 400);
    if (options.min !== undefined && value < options.min)
      throw new HttpException(
        `Bad Request: ${field} must be at least ${options.min}`,
        400,
      );
    if (options.max !== undefined && value > options.max)
      throw new HttpException(
        `Bad Request: ${field} must be at most ${options.max}`,
        400,
      );
    return value;
  }

  /** Login name: letters, digits and `@.+-_`, never the `me` alias. */
  export function username(value: unknown): string {
    const name: string = text("username", value, { min: 1, max: 150 });
    if (USERNAME.test(name) === false)
      throw new HttpException(
        "Bad Request: username may only contain letters, digits and @/./+/-/_",
        400,
      );
    if (name === ME)
      throw new HttpException(`Bad Request: username "${ME}" is reserved`, 400);
    return name;
  }

  export function email(value: unknown): string {
    const address: string = text("email", value, { min: 1, max: 254 });
    if (EMAIL.test(address) === false)
      throw new HttpException("Bad Request: email is not valid", 400);
    return address;
  }

  export function slug(value: unknown): string {
    const slug: string = text("slug", value, { min: 1, max: 50 });
    if (SLUG.test(slug) === false)
      throw new HttpException(
        "Bad Request: slug may only contain letters, digits, - and _",
        400,
      );
    return slug;
  }

  /** Alias of the requesting account in `/users/{username}`. */
  export const ME = "me";
}

const USERNAME = /^[\w.@+-]+$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const SLUG = /^[-a-zA-Z0-9_]+$/;
