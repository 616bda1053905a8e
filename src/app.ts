import express from "express";
import cookieParser from "cookie-parser";
import cors from "cors";
import createError from "http-errors";
import { env } from "./config/env.js";
import localizedRouter from "./routes/index.js";
import * as siteController from "./controllers/site.controller.js";
import { errorHandler } from "./middlewares/error.middleware.js";
import { loadUser } from "./middlewares/auth.middleware.js";
import { languagePrefix } from "./middlewares/language.middleware.js";
import { requestLogger } from "./middlewares/logging.middleware.js";


export const app = express();

app.set("trust proxy", env.NODE_ENV === "production");

// Dynamic CORS Configuration
app.use(cors({
  origin: function (requestOrigin, callback) {
    // Allow requests with no origin (like mobile apps or curl)
    if (!requestOrigin) return callback(null, true);

    const isAllowed = /^http:\/\/localhost:\d+$/.test(requestOrigin)
      || env.ALLOWED_ORIGINS.includes(requestOrigin);

    if (isAllowed) {
      callback(null, true); // Reflect the origin back to the browser
    } else {
      callback(createError(403, "Not allowed by CORS"));
    }
  },
  credentials: true, // Essential for Cookies to work
}));

app.use(requestLogger);
app.use(cookieParser());
app.use(express.json());
app.use(express.urlencoded({ extended: false }));
app.use(loadUser);

app.get("/health", (_req, res) => {
  res.status(200).json({ message: "ok" });
});
app.get("/sitemap.xml", siteController.sitemap);
app.get("/robots.txt", siteController.robots);
app.get("/", (_req, res) => {
  res.redirect(302, `/${env.DEFAULT_LANGUAGE}/`);
});

app.use("/:lang", languagePrefix, localizedRouter);

app.use((_req, _res, next) => {
  next(createError(404, "Not Found"));
});

app.use(errorHandler)

export default app
