import "express-session";

export interface SessionUser {
  id: number;
}

declare module "express-session" {
  interface SessionData {
    user?: SessionUser;
  }
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface User {
      id: number;
      email: string;
      isAdmin: boolean;
      createdAt: string;
    }
  }
}
