import fs from "fs";
import path from "path";
import Database from "better-sqlite3";

import { logger } from "../observability/logging";

let connection: Database.Database | null = null;
let connectedPath: string | null = null;

export const MEMORY_DB = ":memory:";

/**
 * Opens the SQLite file at `dbPath`, creating its directory when needed.
 * Any previously open connection is closed first, so a test can start from a
 * fresh in-memory database by connecting again.
 */
export const connectDatabase = (dbPath: string): Database.Database => {
    closeDatabase();
    if (dbPath !== MEMORY_DB) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.pragma("busy_timeout = 5000");
    connection = db;
    connectedPath = dbPath;
    logger.debug({ dbPath }, "[DB] connected");
    return db;
};

export const getDatabase = (): Database.Database => {
    if (!connection) {
        throw new Error("Database is not connected. Call connectDatabase() first.");
    }
    return connection;
};

export const getDatabasePath = (): string | null => connectedPath;

export const closeDatabase = (): void => {
    if (connection?.open) {
        connection.close();
    }
    connection = null;
    connectedPath = null;
};
