import { getDatabase, Tables } from "../../lib/db";

export const Exercise = {
  /** Id of the catalog exercise called `name`, inserting it first if new. */
  findOrCreate(name: string): number {
    const db = getDatabase();
    db.prepare<[string]>(`INSERT OR IGNORE INTO ${Tables.EXERCISES} (name) VALUES (?)`).run(name);
    const row = db
      .prepare<[string], { id: number }>(`SELECT id FROM ${Tables.EXERCISES} WHERE name = ?`)
      .get(name);
    if (!row) {
      throw new Error(`Exercise "${name}" missing after insert`);
    }
    return row.id;
  },
};
