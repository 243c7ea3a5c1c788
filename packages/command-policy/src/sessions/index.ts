export {
  isApprovableCategory,
  type SessionEvent,
  type SessionEventHandler,
  SessionManager,
  type SessionManagerConfig,
} from "./session-manager.js";
