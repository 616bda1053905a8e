import type { UserRecord } from "../repositories/types.js";

declare global {
  namespace Express {
    interface Request {
      /** Signed-in user, resolved from the session cookie. */
      user?: UserRecord;
      /** Id of the session behind `user`. */
      sessionJti?: string;
      /** Language prefix of the route, e.g. "en". */
      language?: string;
    }
  }
}

export {};
