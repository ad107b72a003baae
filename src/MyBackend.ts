import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";

import { MyGlobal } from "./MyGlobal";
import { MyModule } from "./MyModule";

export class MyBackend {
  private application_?: NestExpressApplication;
  private readonly logger: Logger = new Logger("MyBackend");

  public async open(): Promise<void> {
    this.application_ = await NestFactory.create<NestExpressApplication>(
      MyModule,
      { logger: ["error", "warn", "log"] },
    );
    this.application_.enableCors();
    this.application_.enableShutdownHooks();
    await this.application_.listen(MyGlobal.env.API_PORT, "0.0.0.0");
    this.logger.log(`Listening on port ${MyGlobal.env.API_PORT}`);
  }

  public async close(): Promise<void> {
    if (this.application_ === undefined) return;

    const app: NestExpressApplication = this.application_;
    delete this.application_;
    await app.close();
    this.logger.log("Closed");
  }
}
