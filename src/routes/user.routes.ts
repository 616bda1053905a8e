import { Router } from "express";
import * as userController from "../controllers/user.controller.js";
import { validate } from "../middlewares/validation.middleware.js";
import { ajaxRequired } from "../middlewares/ajax.middleware.js";
import { requireAuth } from "../middlewares/auth.middleware.js";
import { updateProfileSchema } from "../schemas/user.schema.js";

const router = Router();

router.get("/me/", requireAuth, userController.personal);
router.patch("/me/profile/", requireAuth, validate(updateProfileSchema), userController.updateProfile);
router.get("/feed/", requireAuth, userController.feed);

router.get("/users/:slug/", userController.profile);
router.get("/users/:slug/follow/", requireAuth, ajaxRequired, userController.follow);
router.get("/users/:slug/followers/", userController.followers);
router.get("/users/:slug/following/", userController.following);

export default router;
