import { MAX_PASSWORD_BYTES, MIN_PASSWORD_LENGTH } from "../app/Inputs/Register.input";
import { escapeHtml, page } from "./layout";

const REGISTER_ERRORS: Record<string, string> = {
  invalid: `Enter a valid email and a password of at least ${MIN_PASSWORD_LENGTH} characters (${MAX_PASSWORD_BYTES} bytes at most).`,
  exists: "An account with that email already exists.",
};

function credentialsForm(action: string, submit: string): string {
  return `<form method="post" action="${action}">
  <p><label>Email <input type="email" name="email" required autocomplete="email"></label></p>
  <p><label>Password <input type="password" name="password" required minlength="${action === "/register" ? MIN_PASSWORD_LENGTH : 1}"></label></p>
  <p><button type="submit">${submit}</button></p>
</form>`;
}

export function renderLogin(error?: string): string {
  const marker = error ? `<p class="error">Invalid email or password.</p>` : "";
  return page(
    "Log in",
    `<h1>Log in</h1>${marker}${credentialsForm("/login", "Log in")}<p>No account? <a href="/register">Register</a></p>`,
  );
}

export function renderRegister(error?: string): string {
  const message = error ? REGISTER_ERRORS[error] ?? REGISTER_ERRORS.invalid : "";
  const marker = message ? `<p class="error">${escapeHtml(message)}</p>` : "";
  return page(
    "Register",
    `<h1>Register</h1>${marker}${credentialsForm("/register", "Create account")}<p>Have an account? <a href="/login">Log in</a></p>`,
  );
}
