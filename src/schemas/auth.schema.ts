import { z } from "zod";

/**
 * Reusable Field Rules
 */
const emailRule = z.email("Invalid email address").trim().toLowerCase();

const firstNameRule = z
  .string()
  .trim()
  .min(3, "Full Name must be at least 3 characters")
  .max(50, "Full Name must be at most 50 characters")
  .refine((val) => /^\p{L}+$/u.test(val.replace(/ /g, "")), "Full Name should contain only latin letters.")
  .refine((val) => val.split(/\s+/).length <= 3, "Full Name should include no more than 3 words.");

const passwordRule = z
  .string()
  .min(8, "This password is too short. It must contain at least 8 characters.")
  .refine((val) => !/^\d+$/.test(val), "This password is entirely numeric.");

/**
 * 1. Signup Request Schema
 */
export const signupRequestSchema = z.object({
  body: z.object({
    email: emailRule,
  }).strict(),
});

export type SignupRequestInput = z.infer<typeof signupRequestSchema>["body"];

/**
 * 2. Email Validation Schema
 */
export const validateEmailQuery = z.object({
  email: emailRule,
});

/**
 * 3. Signup Schema
 */
export const signupSchema = z.object({
  params: z.object({
    token: z.string().min(1),
  }),
  body: z.object({
    firstName: firstNameRule,
    password1: passwordRule,
    password2: z.string(),
  }).strict().refine((val) => val.password1 === val.password2, {
    message: "The two password fields didn't match.",
    path: ["password2"],
  }),
});

export type SignupInput = z.infer<typeof signupSchema>["body"];

/**
 * 4. Signin Schema
 */
export const signinSchema = z.object({
  body: z.object({
    // Any address is looked up; unknown ones answer "noemail"
    email: z.string().trim().toLowerCase().min(1, "Email is required"),
    password: z.string().min(1, "Password is required"),
  }).strict(),
});

export type SigninInput = z.infer<typeof signinSchema>["body"];
