import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

/**
 * Custom validator for duration strings (e.g., "15m", "7h", "14d")
 */
const durationSchema = z.custom<`${number}${'s' | 'm' | 'h' | 'd'}`>((val) => {
  return typeof val === "string" && /^\d+[smhd]$/.test(val);
}, "Invalid duration format (must be like '15m', '1h', '7d')");

const listSchema = z.string().transform((val) =>
  val.split(",").map((item) => item.trim()).filter(Boolean)
);

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(4000),
  MONGO_URI: z.string().min(1),
  JWT_SECRET: z.string().min(16),
  SIGNUP_TOKEN_SECRET: z.string().min(16),
  // Enforce specific format types
  SESSION_EXPIRES_IN: durationSchema.default("14d"),
  SIGNUP_TOKEN_EXPIRES_IN: durationSchema.default("2d"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  SITE_URL: z.url().default("http://localhost:4000").transform((url) => url.replace(/\/+$/, "")),
  LANGUAGES: listSchema.default(["en", "ru"]),
  DEFAULT_LANGUAGE: z.string().min(2).default("en"),
  LOCALE_DIR: z.string().min(1).default("locales"),
  SMTP_URL: z.string().min(1).optional(),
  MAIL_FROM: z.string().min(1).default("noted <no-reply@localhost>"),
  ALLOWED_ORIGINS: listSchema.default([]),
  LOG_REQUESTS: z.stringbool().default(true),
}).refine((val) => val.LANGUAGES.includes(val.DEFAULT_LANGUAGE), {
  message: "DEFAULT_LANGUAGE must be one of LANGUAGES",
  path: ["DEFAULT_LANGUAGE"],
});

export const env = EnvSchema.parse(process.env);

export type Env = typeof env;

/**
 * Helper to convert "15m", "7d" into a future Date object for the Database
 */
export const getExpiryDate = (duration: string, from: number = Date.now()): Date => {
  const match = duration.match(/^(\d+)([smhd])$/);
  if (!match) throw new Error("Invalid duration string");

  const value = parseInt(match[1] ?? "0", 10);
  const unit = match[2];

  switch (unit) {
    case 's': return new Date(from + value * 1000);
    case 'm': return new Date(from + value * 60 * 1000);
    case 'h': return new Date(from + value * 60 * 60 * 1000);
    case 'd': return new Date(from + value * 24 * 60 * 60 * 1000);
    default: return new Date(from);
  }
};
