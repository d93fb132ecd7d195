export interface DbInfoInterface {
  dbPath: string;
  exists: boolean;
  size: number | null;
  counts: Record<string, number | null>;
}
