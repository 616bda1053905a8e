import { Router } from "express";
import * as tagController from "../controllers/tag.controller.js";
import * as sourceController from "../controllers/source.controller.js";
import { ajaxRequired } from "../middlewares/ajax.middleware.js";
import { requireAuth } from "../middlewares/auth.middleware.js";

const router = Router();

router.get("/tags/", tagController.list);
router.get("/tags/:slug/", tagController.getOne);
router.get("/tags/:slug/follow/", requireAuth, ajaxRequired, tagController.follow);

router.get("/sources/:slug/", sourceController.getOne);

export default router;
