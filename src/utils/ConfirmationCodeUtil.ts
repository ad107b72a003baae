import { HttpException, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { v4 } from "uuid";

import { MyGlobal } from "../MyGlobal";
import { YamdbConfirmationCode } from "../database/entities/YamdbConfirmationCode";
import { YamdbUser } from "../database/entities/YamdbUser";
import { IYamdbMailer } from "../mail/IYamdbMailer";

export namespace ConfirmationCodeUtil {
  export const SUBJECT = "Your confirmation code";

  /**
   * Generate a code for the user, store it and email it.
   *
   * Run it inside the transaction creating the user: a failed delivery
   * rejects, so that the caller rolls the account back.
   *
   * @throws {HttpException} 500 when the email cannot be delivered
   */
  export async function issue(props: {
    db: EntityManager;
    mailer: IYamdbMailer;
    user: YamdbUser;
  }): Promise<void> {
    const code: string = v4().replace(/-/g, "");
    await props.db.save(
      props.db.create(YamdbConfirmationCode, {
        user_id: props.user.id,
        code,
        consumed: false,
      }),
    );

    try {
      await props.mailer.send({
        subject: SUBJECT,
        text: code,
        from: MyGlobal.env.ADMIN_EMAIL,
        to: [props.user.email],
      });
    } catch (error) {
      logger.error(
        `Failed to deliver the confirmation code of ${props.user.username}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      throw new HttpException(
        "Internal Server Error: failed to deliver the confirmation code",
        500,
      );
    }
  }

  /**
   * Consume the latest code of a user.
   *
   * Older codes, consumed codes and codes older than
   * `CONFIRMATION_CODE_TTL_HOURS` never match.
   *
   * @returns Whether the given code was accepted
   */
  export async function consume(props: {
    db: EntityManager;
    user: YamdbUser;
    code: string;
  }): Promise<boolean> {
    const latest: YamdbConfirmationCode | null = await props.db.findOne(
      YamdbConfirmationCode,
      {
        where: { user_id: props.user.id },
        order: { id: "DESC" },
      },
    );
    if (
      latest === null ||
      latest.consumed === true ||
      latest.code !== props.code ||
      expired(latest)
    )
      return false;

    // conditional update so that concurrent exchanges consume it once
    const result = await props.db.update(
      YamdbConfirmationCode,
      { id: latest.id, consumed: false },
      { consumed: true },
    );
    return result.affected !== 0;
  }

  const expired = (code: YamdbConfirmationCode): boolean =>
    code.created_at.getTime() +
      MyGlobal.env.CONFIRMATION_CODE_TTL_HOURS * 60 * 60 * 1000 <
    Date.now();

  const logger: Logger = new Logger("ConfirmationCode");
}
