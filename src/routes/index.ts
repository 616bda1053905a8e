import { Router } from "express";
import authRouter from "./auth.routes.js";
import userRouter from "./user.routes.js";
import noteRouter from "./note.routes.js";
import tagRouter from "./tag.routes.js";
import * as siteController from "../controllers/site.controller.js";

// Everything served under a language prefix, e.g. /en/...
const router = Router();

// Fixed /users/ routes go first so that they win over /users/:slug/
router.use("/users", authRouter);
router.use(userRouter);
router.use(tagRouter);
router.get("/jsi18n/", siteController.catalog);
router.use(noteRouter);

export default router;
