import { Request, Response, NextFunction } from "express";

import { resolveSessionUser } from "./auth";

/**
 * Authenticates the request AND requires the admin flag, read fresh from the
 * database on every request.
 */
export default function OnlyAdmins(req: Request, res: Response, next: NextFunction) {
  try {
    const user = resolveSessionUser(req);
    if (!user) {
      return res.status(401).type("text").send("Unauthorized");
    }
    if (!user.isAdmin) {
      return res.status(403).type("text").send("You don't have access to this resource!");
    }
    req.user = user;
    return next();
  } catch (err) {
    return next(err);
  }
}
