import { HttpException } from "@nestjs/common";
import { QueryFailedError } from "typeorm";

export namespace ExceptionUtil {
  /** 405 for routes that exist but refuse the method. */
  export const methodNotAllowed = (method: string): HttpException =>
    new HttpException(`Method "${method}" not allowed.`, 405);

  /**
   * Whether the store rejected a write on a unique constraint.
   *
   * Covers PostgreSQL (`23505`) and sqlite (`SQLITE_CONSTRAINT_UNIQUE`).
   */
  export const isUniqueViolation = (error: unknown): boolean => {
    if (!(error instanceof QueryFailedError)) return false;
    const driverError: unknown = error.driverError;
    return (
      typeof driverError === "object" &&
      driverError !== null &&
      "code" in driverError &&
      (driverError.code === "23505" ||
        driverError.code === "SQLITE_CONSTRAINT_UNIQUE")
    );
  };
}
