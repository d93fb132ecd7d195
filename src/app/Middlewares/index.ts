import Auth from "./auth";
import OnlyAdmins from "./onlyAdmins";

export { Auth, OnlyAdmins };
export { requireUser } from "./auth";
export { authLimiter } from "./rateLimiters";
export { errorHandler, notFound } from "./errorHandler";
