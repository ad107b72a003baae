import "reflect-metadata";

import { Logger } from "@nestjs/common";

import { MyBackend } from "../MyBackend";

const main = async (): Promise<void> => {
  const backend: MyBackend = new MyBackend();
  await backend.open();

  process.on("SIGINT", () => {
    backend.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(error);
        process.exit(1);
      },
    );
  });
};

const logger: Logger = new Logger("Server");
main().catch((error: unknown) => {
  logger.error(error);
  process.exit(-1);
});
