import fs from "fs";

import { countRows, TableName, Tables } from "../../lib/db";
import { logger } from "../../observability/logging";
import { DbInfoInterface } from "../../types/DbInfoInterface";
import { getDatabasePath, MEMORY_DB } from "../../utils/dbConnection";

const COUNTED: TableName[] = [
  Tables.WORKOUT_TEMPLATES,
  Tables.EXERCISES,
  Tables.TEMPLATE_EXERCISES,
  Tables.WORKOUT_SESSIONS,
  Tables.SET_ENTRIES,
  Tables.USERS,
];

function fileSize(dbPath: string): { exists: boolean; size: number | null } {
  if (dbPath === MEMORY_DB || !fs.existsSync(dbPath)) {
    return { exists: false, size: null };
  }
  const stat = fs.statSync(dbPath);
  return { exists: true, size: stat.isFile() ? stat.size : null };
}

/** Which database file is in use and how many rows each table holds. */
export function getDbInfo(): DbInfoInterface {
  const dbPath = getDatabasePath() ?? "";
  const counts: Record<string, number | null> = {};
  for (const table of COUNTED) {
    try {
      counts[table] = countRows(table);
    } catch (err) {
      logger.error({ err, table }, "[DB] failed to count rows");
      counts[table] = null;
    }
  }
  return { dbPath, ...fileSize(dbPath), counts };
}
