import { Request, Response, NextFunction } from "express";

import { publicUser, User } from "../Models/User";
import { UserInterface } from "../../types/UserInterface";
import { HttpError } from "../../utils/httpError";
import "../../types/session";

/** The account behind the request's login session, or null. */
export function resolveSessionUser(req: Request): UserInterface | null {
  const id = req.session?.user?.id;
  if (typeof id !== "number") return null;
  const user = User.findById(id);
  return user ? publicUser(user) : null;
}

/**
 * Requires a logged-in user. Page loads are sent to the login form, anything
 * else gets a 401.
 */
export default function Auth(req: Request, res: Response, next: NextFunction) {
  try {
    const user = resolveSessionUser(req);
    if (!user) {
      if (req.method === "GET") {
        return res.redirect(303, "/login");
      }
      return res.status(401).type("text").send("Unauthorized");
    }
    req.user = user;
    return next();
  } catch (err) {
    return next(err);
  }
}

/** The user attached by `Auth` / `OnlyAdmins`; a handler mounted without them gets a 401. */
export function requireUser(req: Request): Express.User {
  if (!req.user) {
    throw new HttpError(401, "Unauthorized");
  }
  return req.user;
}
