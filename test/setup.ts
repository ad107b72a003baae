import "reflect-metadata";

import { Logger } from "@nestjs/common";

process.env.JWT_SECRET_KEY ??= "test-secret";
Logger.overrideLogger(false);
