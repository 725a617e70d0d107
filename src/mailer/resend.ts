//src/mailer/resend.ts
import { Resend } from "resend";

export interface VerificationEmailPayload {
  to: string;
  name: string;
  link: string;
}

export type MailResult = { success: true } | { success: false; error: string };

export interface Mailer {
  sendVerificationEmail(payload: VerificationEmailPayload): Promise<MailResult>;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderVerificationEmail({ name, link }: VerificationEmailPayload) {
  const safeName = escapeHtml(name);
  const safeLink = escapeHtml(link);

  const html = `
    <div style="font-family: Arial, sans-serif; line-height:1.6;">
      <h2>Confirm your email on Contact-App</h2>
      <p>Hi ${safeName}, thanks for signing up. Please confirm this address to start using your account.</p>
      <p style="text-align:center;margin:32px 0;">
        <a href="${safeLink}"
           style="background:#007bff;color:white;padding:10px 20px;border-radius:6px;text-decoration:none;">
           Confirm email
        </a>
      </p>
      <p>If the button doesn’t work, copy and paste this link in your browser:</p>
      <p><a href="${safeLink}">${safeLink}</a></p>
    </div>
  `;

  const text = `
Hi ${name}, confirm your email on Contact-App.
Open this link to confirm: ${link}
`;

  return { subject: "Confirm your email on Contact-App", html, text };
}

export class ResendMailer implements Mailer {
  private readonly resend: Resend;

  constructor(apiKey: string, private readonly from: string) {
    this.resend = new Resend(apiKey);
  }

  async sendVerificationEmail(payload: VerificationEmailPayload): Promise<MailResult> {
    const { subject, html, text } = renderVerificationEmail(payload);
    try {
      const { error } = await this.resend.emails.send({
        from: this.from,
        to: payload.to,
        subject,
        html,
        text,
      });
      if (error) return { success: false, error: error.message };
      return { success: true };
    } catch (err) {
      return { success: false, error: err instanceof Error ? err.message : "Unknown error" };
    }
  }
}
