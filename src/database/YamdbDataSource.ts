import { DataSourceOptions } from "typeorm";

import { MyGlobal } from "../MyGlobal";
import { YamdbCategory } from "./entities/YamdbCategory";
import { YamdbComment } from "./entities/YamdbComment";
import { YamdbConfirmationCode } from "./entities/YamdbConfirmationCode";
import { YamdbGenre } from "./entities/YamdbGenre";
import { YamdbReview } from "./entities/YamdbReview";
import { YamdbTitle } from "./entities/YamdbTitle";
import { YamdbUser } from "./entities/YamdbUser";

export namespace YamdbDataSource {
  export const ENTITIES = [
    YamdbUser,
    YamdbConfirmationCode,
    YamdbCategory,
    YamdbGenre,
    YamdbTitle,
    YamdbReview,
    YamdbComment,
  ];

  /**
   * Connection options of the environment.
   *
   * PostgreSQL when `DATABASE_URL` is configured, otherwise a local sqlite
   * file. The schema is synchronized from the entities on startup.
   */
  export const options = (env: MyGlobal.IEnvironments): DataSourceOptions =>
    env.DATABASE_URL !== null
      ? {
          type: "postgres",
          url: env.DATABASE_URL,
          entities: ENTITIES,
          synchronize: true,
        }
      : {
          type: "better-sqlite3",
          database: env.YAMDB_SQLITE_PATH,
          entities: ENTITIES,
          synchronize: true,
        };
}
