import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { MyGlobal } from "./MyGlobal";
import { AuthController } from "./controllers/auth/AuthController";
import { CategoriesController } from "./controllers/categories/CategoriesController";
import { GenresController } from "./controllers/genres/GenresController";
import { TitlesController } from "./controllers/titles/TitlesController";
import { TitlesReviewsCommentsController } from "./controllers/titles/reviews/comments/TitlesReviewsCommentsController";
import { TitlesReviewsController } from "./controllers/titles/reviews/TitlesReviewsController";
import { UsersController } from "./controllers/users/UsersController";
import { YamdbDataSource } from "./database/YamdbDataSource";
import { IYamdbMailer } from "./mail/IYamdbMailer";
import { NodemailerMailer } from "./mail/NodemailerMailer";

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: () => YamdbDataSource.options(MyGlobal.env),
    }),
  ],
  controllers: [
    AuthController,
    UsersController,
    CategoriesController,
    GenresController,
    TitlesController,
    TitlesReviewsController,
    TitlesReviewsCommentsController,
  ],
  providers: [
    {
      provide: IYamdbMailer.TOKEN,
      useFactory: (): IYamdbMailer =>
        new NodemailerMailer(MyGlobal.env.SMTP_URL),
    },
  ],
})
export class MyModule {}
