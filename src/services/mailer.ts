import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Config } from "../config";

export type MailConfig = Config["mail"];

/**
 * SMTP transport shared by user notifications and operator alerts.
 * Null when mail is not configured.
 */
export function createMailTransport(mail: MailConfig): Transporter | null {
  if (!mail.enabled || !mail.smtp.host) {
    return null;
  }

  return nodemailer.createTransport({
    host: mail.smtp.host,
    port: mail.smtp.port,
    secure: mail.smtp.port === 465,
    auth: {
      user: mail.smtp.user,
      pass: mail.smtp.pass,
    },
  });
}
