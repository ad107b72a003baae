import { IYamdbMailer } from "../../src/mail/IYamdbMailer";

/** Mailer keeping messages in memory, optionally failing every delivery. */
export class RecordingMailer implements IYamdbMailer {
  public readonly sent: IYamdbMailer.IMessage[] = [];
  public failure: Error | null = null;

  public async send(message: IYamdbMailer.IMessage): Promise<void> {
    if (this.failure !== null) throw this.failure;
    this.sent.push(message);
  }

  /** Latest message, throwing when nothing was sent. */
  public last(): IYamdbMailer.IMessage {
    const message = this.sent[this.sent.length - 1];
    if (message === undefined) throw new Error("No email sent");
    return message;
  }
}
