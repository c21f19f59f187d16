import sgMail from "@sendgrid/mail";
import { config } from "../config";
import { getStore } from "../store";
import { newId, nowIso } from "../time";
import type { EmailLog, User } from "../types";
import { renderEmail, type EmailInput } from "./templates";

export type OutgoingEmail = { to: string; subject: string; html: string };

export interface Mailer {
  /** Resolves true when the provider accepted the message. */
  send(email: OutgoingEmail): Promise<boolean>;
}

export class SendGridMailer implements Mailer {
  constructor(apiKey: string, private readonly from: string) {
    sgMail.setApiKey(apiKey);
  }

  async send(email: OutgoingEmail): Promise<boolean> {
    const [response] = await sgMail.send({ to: email.to, from: this.from, subject: email.subject, html: email.html });
    return response.statusCode === 202;
  }
}

let mailerInstance: Mailer | null | undefined;

export function getMailer(): Mailer | null {
  if (mailerInstance !== undefined) return mailerInstance;
  mailerInstance = config.sendgridApiKey ? new SendGridMailer(config.sendgridApiKey, config.senderEmail) : null;
  return mailerInstance;
}

export function setMailer(mailer: Mailer | null | undefined): void {
  mailerInstance = mailer;
}

/**
 * Renders the template in the recipient's language and sends it. Every attempt
 * is written to email_logs. Resolves false when no mailer is configured or the
 * send failed; email problems never fail the calling request.
 */
export async function sendEmail(user: Pick<User, "id" | "email" | "language">, input: EmailInput): Promise<boolean> {
  const mailer = getMailer();
  if (!mailer) {
    // eslint-disable-next-line no-console
    console.warn(`[email] SendGrid not configured, ${input.type} email not sent`);
    return false;
  }

  const rendered = renderEmail(input, user.language);
  const log: EmailLog = {
    id: newId(),
    user_id: user.id,
    email_type: rendered.type,
    recipient_email: user.email,
    subject: rendered.subject,
    status: "failed",
    error_message: null,
    sent_at: null,
    created_at: nowIso()
  };

  let accepted = false;
  try {
    accepted = await mailer.send({ to: user.email, subject: rendered.subject, html: rendered.html });
    if (accepted) {
      log.status = "sent";
      log.sent_at = nowIso();
    }
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error("[email] send failed", e);
    log.error_message = e instanceof Error ? e.message : String(e);
  }

  await getStore().create("email_logs", log);
  return accepted;
}
