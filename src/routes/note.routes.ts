import { Router } from "express";
import * as noteController from "../controllers/note.controller.js";
import { validate } from "../middlewares/validation.middleware.js";
import { ajaxRequired } from "../middlewares/ajax.middleware.js";
import { requireAuth } from "../middlewares/auth.middleware.js";
import { createNoteSchema, updateNoteSchema } from "../schemas/note.schema.js";

const router = Router();

router.get("/", noteController.welcome);
router.get("/home/", requireAuth, noteController.home);

router.get("/notes/new/", requireAuth, noteController.createForm);
router.post("/notes/new/", requireAuth, validate(createNoteSchema), noteController.create);

router.get("/notes/:slug/", noteController.getOne);
router.get("/notes/:slug/fork/", requireAuth, noteController.forkForm);
router.post("/notes/:slug/fork/", requireAuth, validate(updateNoteSchema), noteController.fork);
router.post("/notes/:slug/edit/", requireAuth, validate(updateNoteSchema), noteController.update);
router.post("/notes/:slug/delete/", requireAuth, noteController.remove);

router.get("/notes/:slug/pin/", requireAuth, ajaxRequired, noteController.pin);
router.get("/notes/:slug/like/", requireAuth, ajaxRequired, noteController.like);
router.get("/notes/:slug/bookmark/", requireAuth, ajaxRequired, noteController.bookmark);
router.get("/notes/:slug/download/:filetype/", requireAuth, noteController.download);

export default router;
