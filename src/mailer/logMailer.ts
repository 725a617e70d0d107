import type { Logger } from "../middleware/requestLogger";
import type { MailResult, Mailer, VerificationEmailPayload } from "./resend";

/** Used when no RESEND_API_KEY is configured: the link goes to the log instead. */
export class LogMailer implements Mailer {
  constructor(private readonly logger: Logger) {}

  async sendVerificationEmail({ to, link }: VerificationEmailPayload): Promise<MailResult> {
    this.logger.info({ to, link }, "[mailer] verification email (not sent, no RESEND_API_KEY)");
    return { success: true };
  }
}
