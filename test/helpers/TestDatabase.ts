import { DataSource } from "typeorm";

import { YamdbDataSource } from "../../src/database/YamdbDataSource";

export namespace TestDatabase {
  /** Fresh in-memory store with the synchronized schema. */
  export const open = (): Promise<DataSource> =>
    new DataSource({
      type: "better-sqlite3",
      database: ":memory:",
      entities: YamdbDataSource.ENTITIES,
      synchronize: true,
    }).initialize();
}
