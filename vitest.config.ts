import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      MONGO_URI: "mongodb://127.0.0.1:27017/noted-test",
      JWT_SECRET: "test-secret-test-secret",
      SIGNUP_TOKEN_SECRET: "test-signup-secret-value",
      BCRYPT_ROUNDS: "4",
      SITE_URL: "http://noted.test",
      LOG_REQUESTS: "false",
    },
  },
});
