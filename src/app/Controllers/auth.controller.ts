import { NextFunction, Request, Response } from "express";
import { plainToInstance } from "class-transformer";
import { validate } from "class-validator";
import passport from "passport";

import { RegisterInput } from "../Inputs/Register.input";
import { UserLoginInput } from "../Inputs/UserLogin.input";
import { claimLegacyRows, registerUser } from "../../services/auth/accounts";
import { SESSION_COOKIE } from "../../lib/sessionStore";
import { renderLogin, renderRegister } from "../../views/auth";
import "../../types/session";

function formBody(req: Request): Record<string, unknown> {
  return req.body ?? {};
}

function queryFlag(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

/**
 * Swaps in a fresh login session carrying `userId`, then hands any
 * ownerless legacy rows to that user.
 */
function startSession(req: Request, userId: number, done: (err?: unknown) => void) {
  req.session.regenerate((regenErr) => {
    if (regenErr) return done(regenErr);
    req.session.user = { id: userId };
    req.session.save((saveErr) => {
      if (saveErr) return done(saveErr);
      try {
        claimLegacyRows(userId);
        return done();
      } catch (claimErr) {
        return done(claimErr);
      }
    });
  });
}

class AuthController {
  static showLogin = (req: Request, res: Response) => {
    res.type("html").send(renderLogin(queryFlag(req.query.error)));
  };

  static showRegister = (req: Request, res: Response) => {
    res.type("html").send(renderRegister(queryFlag(req.query.error)));
  };

  static register = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = plainToInstance(RegisterInput, formBody(req));
      const errors = await validate(input);
      if (errors.length) {
        return res.redirect(303, "/register?error=invalid");
      }

      const result = await registerUser(input.email, input.password);
      if (result.status === "exists") {
        return res.redirect(303, "/register?error=exists");
      }

      startSession(req, result.user.id, (err) => {
        if (err) return next(err);
        return res.redirect(303, "/");
      });
    } catch (err) {
      next(err);
    }
  };

  static login = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = plainToInstance(UserLoginInput, formBody(req));
      const errors = await validate(input);
      if (errors.length) {
        return res.redirect(303, "/login?error=1");
      }

      passport.authenticate(
        "local",
        { session: false },
        (err: unknown, user?: Express.User | false | null) => {
          if (err) return next(err);
          if (!user) return res.redirect(303, "/login?error=1");
          startSession(req, user.id, (sessionErr) => {
            if (sessionErr) return next(sessionErr);
            return res.redirect(303, "/");
          });
        },
      )(req, res, next);
    } catch (err) {
      next(err);
    }
  };

  static logout = (req: Request, res: Response, next: NextFunction) => {
    req.session.destroy((err) => {
      if (err) return next(err);
      res.clearCookie(SESSION_COOKIE, { path: "/" });
      return res.redirect(303, "/login");
    });
  };
}

export { AuthController };
