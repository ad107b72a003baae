/**
 * Outgoing email channel.
 *
 * `send()` resolves once the message has been handed over and rejects when
 * the delivery fails; callers must not swallow the rejection.
 */
export interface IYamdbMailer {
  send(message: IYamdbMailer.IMessage): Promise<void>;
}
export namespace IYamdbMailer {
  /** Injection token of the mailer. */
  export const TOKEN = "YAMDB_MAILER";

  export interface IMessage {
    subject: string;
    text: string;
    from: string;
    to: string[];
  }
}
