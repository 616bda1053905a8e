import { describe, expect, it } from "vitest";
import { sendSignupEmail, signupLink } from "../../src/services/mail.service.js";

describe("signup mail", () => {
  it("links to the signup page of the language", () => {
    expect(signupLink("ru", "a.b+c")).toBe("http://noted.test/ru/users/signup/a.b%2Bc/");
  });

  it("renders the link into the message", async () => {
    const mail = await sendSignupEmail("new@example.com", "en", "token-1");

    expect(mail.to).toBe("new@example.com");
    expect(mail.subject).toBe("Finish signing up to noted");
    expect(mail.text.split("\n")).toEqual([
      "Welcome to noted!",
      "",
      "Follow the link below to finish creating your account:",
      "http://noted.test/en/users/signup/token-1/",
      "",
      "The link expires in 2d.",
    ]);
  });
});
