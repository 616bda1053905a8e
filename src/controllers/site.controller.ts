import type { Request, Response } from "express";
import { asyncHandler } from "../utils/asyncHandler.js";
import { buildRobots, buildSitemap } from "../services/site.service.js";
import { loadCatalog } from "../config/i18n.js";
import { getLanguage } from "../middlewares/language.middleware.js";

// GET /sitemap.xml
export const sitemap = asyncHandler(async (_req: Request, res: Response) => {
  res.type("application/xml").status(200).send(await buildSitemap());
});

// GET /robots.txt
export const robots = (_req: Request, res: Response) => {
  res.type("text/plain").status(200).send(buildRobots());
};

// GET /:lang/jsi18n/
export const catalog = (req: Request, res: Response) => {
  const locale = getLanguage(req);
  res.status(200).json({ locale, messages: loadCatalog(locale) });
};
