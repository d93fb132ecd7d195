import { Strategy as LocalStrategy, IStrategyOptions } from "passport-local";

import { publicUser } from "../../app/Models/User";
import { verifyCredentials } from "../../services/auth/accounts";
import "../../types/session";

/**
 * Passport local strategy: email + password checked against the bcrypt hash
 * in the users table.
 */
const options: IStrategyOptions = {
  usernameField: "email",
  passwordField: "password",
  session: false,
};

export default new LocalStrategy(options, (email, password, done) => {
  verifyCredentials(email, password)
    .then((user) => {
      if (!user) {
        return done(null, false, { message: "Login credentials error" });
      }
      return done(null, publicUser(user));
    })
    .catch((err: unknown) => done(err));
});
