import { Logger } from "@nestjs/common";
import { Transporter, createTransport } from "nodemailer";

import { IYamdbMailer } from "./IYamdbMailer";

/**
 * Mailer backed by nodemailer.
 *
 * Without an SMTP URL, messages go through the JSON transport and are only
 * written to the log.
 */
export class NodemailerMailer implements IYamdbMailer {
  private readonly logger: Logger = new Logger("Mailer");
  private readonly transporter: Transporter;
  private readonly dry: boolean;

  public constructor(smtpUrl: string | null) {
    this.dry = smtpUrl === null;
    this.transporter =
      smtpUrl !== null
        ? createTransport(smtpUrl)
        : createTransport({ jsonTransport: true });
  }

  public async send(message: IYamdbMailer.IMessage): Promise<void> {
    await this.transporter.sendMail({
      subject: message.subject,
      text: message.text,
      from: message.from,
      to: message.to,
    });
    if (this.dry)
      this.logger.log(
        `"${message.subject}" to ${message.to.join(", ")}: ${message.text}`,
      );
    else
      this.logger.log(`"${message.subject}" sent to ${message.to.join(", ")}`);
  }
}
