import { Router } from "express";
import * as authController from "../controllers/auth.controller.js";
import { validate } from "../middlewares/validation.middleware.js";
import { ajaxRequired } from "../middlewares/ajax.middleware.js";
import { signinSchema, signupRequestSchema, signupSchema } from "../schemas/auth.schema.js";

const router = Router();

router.post("/signup-request/", ajaxRequired, validate(signupRequestSchema), authController.signupRequest);
router.get("/validate-email/", ajaxRequired, authController.validateEmail);
router.get("/signup/:token/", authController.signupForm);
router.post("/signup/:token/", authController.signupTokenRequired, validate(signupSchema), authController.signup);
router.route("/signin/")
  .post(ajaxRequired, validate(signinSchema), authController.signin)
  .all(authController.signinBadRequest);
router.get("/signout/", authController.signout);

export default router;
