import "reflect-metadata";
import http from "http";
import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import passport from "passport";
import session from "express-session";

import { AppConfig } from "./config";
import { initDatabase } from "./database/migrate";
import { AuthRoutes, WorkoutRoutes, TemplateRoutes, AdminRoutes, HealthRoutes } from "./routes";
import { local } from "./utils/strategies";
import { authLimiter, errorHandler, notFound } from "./app/Middlewares";
import { connectDatabase } from "./utils/dbConnection";
import { SESSION_COOKIE, SESSION_TTL_MS, SqliteSessionStore } from "./lib/sessionStore";
import { seedTemplatesIfEmpty } from "./services/templates/catalog";
import { getDbInfo } from "./services/diagnostics/dbInfo";
import { countUnclaimedRows } from "./services/auth/accounts";
import { withRequestId, httpLogger, logger, setLogLevel } from "./observability/logging";

export class Server {
  public app: Application;

  private readonly config: AppConfig;

  constructor(config: AppConfig) {
    this.app = express();
    this.config = config;
    setLogLevel(config.logLevel);

    this.prepareDatabase();
    this.registerMiddlewares();
    this.initializePassportAndStrategies();
    this.registerRoutes();
  }

  prepareDatabase() {
    const db = connectDatabase(this.config.dbPath);
    initDatabase(db);
    seedTemplatesIfEmpty();
    const info = getDbInfo();
    logger.info({ dbPath: info.dbPath, exists: info.exists }, "[DB] ready");
    logger.info({ counts: info.counts }, "[DB] counts");
    const unclaimed = countUnclaimedRows();
    if (unclaimed > 0) {
      logger.info({ unclaimed }, "[DB] rows without an owner; the next login claims them");
    }
  }

  registerMiddlewares() {
    if (this.config.trustProxy) {
      // Vercel / managed platforms terminate TLS in front of us
      this.app.set("trust proxy", 1);
    }
    this.app.use(withRequestId, httpLogger);
    // Plain-HTTP deployments must not be told to upgrade their form posts.
    this.app.use(
      helmet({
        contentSecurityPolicy: {
          directives: { upgradeInsecureRequests: this.config.cookieSecure ? [] : null },
        },
        strictTransportSecurity: this.config.cookieSecure,
      }),
    );
    this.app.use(compression());
    this.app.use(express.urlencoded({ limit: "100kb", extended: false }));
    this.app.use(
      session({
        name: SESSION_COOKIE,
        store: new SqliteSessionStore(),
        secret: this.config.sessionSecret,
        resave: false,
        saveUninitialized: false,
        cookie: {
          httpOnly: true,
          sameSite: "lax",
          secure: this.config.cookieSecure,
          maxAge: SESSION_TTL_MS,
          path: "/",
        },
      }),
    );
    this.app.use(["/login", "/register"], authLimiter({ max: this.config.authRateLimit }));
  }

  initializePassportAndStrategies() {
    this.app.use(passport.initialize());
    passport.use(local);
  }

  registerRoutes() {
    this.app.use("/", HealthRoutes);
    this.app.use("/", AuthRoutes);
    this.app.use("/", WorkoutRoutes);
    this.app.use("/template", TemplateRoutes);
    this.app.use("/admin", AdminRoutes);
    this.app.use(notFound);
    this.app.use(errorHandler);
  }

  start(): http.Server {
    const server = http.createServer(this.app);
    server.listen(this.config.port, () => {
      logger.info({ port: this.config.port }, "HTTP server started");
    });
    return server;
  }
}
