import nodemailer, { type Transporter } from "nodemailer";
import { env } from "../config/env.js";

let transporter: Transporter | null = null;

// Without SMTP_URL mail is rendered to JSON and logged instead of sent.
const getTransporter = (): Transporter => {
  if (!transporter) {
    transporter = env.SMTP_URL
      ? nodemailer.createTransport(env.SMTP_URL)
      : nodemailer.createTransport({ jsonTransport: true });
  }
  return transporter;
};

export type SentMail = { messageId: string; to: string; subject: string; text: string };

export async function sendMail(to: string, subject: string, text: string): Promise<SentMail> {
  const info = await getTransporter().sendMail({ from: env.MAIL_FROM, to, subject, text });

  if (!env.SMTP_URL && env.NODE_ENV !== "test") {
    console.log(`[MAIL]: ${subject} -> ${to}\n${text}`);
  }
  return { messageId: info.messageId, to, subject, text };
}

export function signupLink(language: string, token: string) {
  return `${env.SITE_URL}/${language}/users/signup/${encodeURIComponent(token)}/`;
}

export async function sendSignupEmail(email: string, language: string, token: string) {
  const link = signupLink(language, token);
  const text = [
    "Welcome to noted!",
    "",
    "Follow the link below to finish creating your account:",
    link,
    "",
    `The link expires in ${env.SIGNUP_TOKEN_EXPIRES_IN}.`,
  ].join("\n");

  return sendMail(email, "Finish signing up to noted", text);
}
