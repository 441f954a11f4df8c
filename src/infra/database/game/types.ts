import type { ColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Players Table
// Scalar counters live in columns so the leaderboard can sort on them;
// the rest of the progress record is a JSONB document validated on read.
export interface Players {
  id: string; // UUID
  username: string;
  current_level: number;
  total_xp: number;
  total_coins: number;
  progress: ColumnType<unknown, string, string>; // JSONB, written as a JSON string
  created_at: Timestamp;
  last_active_at: Timestamp;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>; // database default on insert
}

export interface GameDatabase {
  players: Players;
}
