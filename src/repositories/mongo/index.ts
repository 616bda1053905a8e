import type { Repositories } from "../types.js";
import { mongoActionRepository } from "./action.repository.js";
import { mongoContactRepository } from "./contact.repository.js";
import { mongoNoteRepository } from "./note.repository.js";
import { mongoSessionRepository } from "./session.repository.js";
import { mongoSignupTokenRepository } from "./signupToken.repository.js";
import { mongoSourceRepository } from "./source.repository.js";
import { mongoUserRepository } from "./user.repository.js";

export const mongoRepositories: Repositories = {
  users: mongoUserRepository,
  notes: mongoNoteRepository,
  sources: mongoSourceRepository,
  contacts: mongoContactRepository,
  actions: mongoActionRepository,
  signupTokens: mongoSignupTokenRepository,
  sessions: mongoSessionRepository,
};
