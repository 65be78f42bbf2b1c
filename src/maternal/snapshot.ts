import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { SnapshotError } from "./errors";
import { HealthRecord, MaternalSnapshot, SnapshotChange, StoredMotherProfile } from "./types";

export interface SnapshotRepository {
  load(): MaternalSnapshot | null;
  /** Replaces everything stored with `snapshot`. */
  save(snapshot: MaternalSnapshot): void;
  /** Writes only the rows of one create or append. */
  saveChange(change: SnapshotChange): void;
  close(): void;
}

const IN_MEMORY = ":memory:";

const decimalTimestamp = z.string().regex(/^\d+$/).transform((value) => BigInt(value));
const jsonStringList = z.string().transform((raw, ctx) => {
  const parsed = z.array(z.string()).safeParse(parseJson(raw));
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON array of strings" });
    return z.NEVER;
  }
  return parsed.data;
});

const counterRowSchema = z.object({
  next_mother_id: z.number().int().nonnegative(),
  next_health_record_id: z.number().int().nonnegative(),
});

const profileRowSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  age: z.number().int(),
  blood_type: z.string(),
  expected_delivery_date: decimalTimestamp,
  medical_history_json: jsonStringList,
  emergency_contact: z.string(),
  created_at: decimalTimestamp,
  last_checkup: decimalTimestamp.nullable(),
});

const recordRowSchema = z.object({
  id: z.number().int().nonnegative(),
  mother_id: z.number().int().nonnegative(),
  timestamp: decimalTimestamp,
  blood_pressure: z.string(),
  weight: z.number(),
  symptoms_json: jsonStringList,
  notes: z.string(),
  next_appointment: decimalTimestamp.nullable(),
  health_status: z.enum(["Normal", "NeedsAttention", "Critical"]),
});

/**
 * Keeps the store in SQLite. Writes happen inside one `BEGIN IMMEDIATE`
 * transaction each and roll back as a whole.
 */
export class SqliteSnapshotRepository implements SnapshotRepository {
  private readonly db: Database.Database;
  private readonly writeCounters: Database.Statement;
  private readonly upsertProfile: Database.Statement;
  private readonly insertRecord: Database.Statement;

  constructor(pathToDb: string) {
    if (pathToDb === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolute = resolve(pathToDb);
      mkdirSync(dirname(absolute), { recursive: true });
      this.db = new Database(absolute);
      this.db.exec("PRAGMA journal_mode = WAL;");
      this.db.exec("PRAGMA synchronous = NORMAL;");
    }
    this.db.exec("PRAGMA foreign_keys = ON;");
    this.initSchema();

    this.writeCounters = this.db.prepare(
      `
      INSERT INTO maternal_counters (singleton, next_mother_id, next_health_record_id)
      VALUES (1, ?, ?)
      ON CONFLICT(singleton) DO UPDATE SET
        next_mother_id = excluded.next_mother_id,
        next_health_record_id = excluded.next_health_record_id
    `
    );
    this.upsertProfile = this.db.prepare(
      `
      INSERT INTO mother_profiles (
        id, name, age, blood_type, expected_delivery_date, medical_history_json,
        emergency_contact, created_at, last_checkup
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        age = excluded.age,
        blood_type = excluded.blood_type,
        expected_delivery_date = excluded.expected_delivery_date,
        medical_history_json = excluded.medical_history_json,
        emergency_contact = excluded.emergency_contact,
        created_at = excluded.created_at,
        last_checkup = excluded.last_checkup
    `
    );
    this.insertRecord = this.db.prepare(
      `
      INSERT INTO health_records (
        id, mother_id, timestamp, blood_pressure, weight, symptoms_json,
        notes, next_appointment, health_status
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
    );
  }

  load(): MaternalSnapshot | null {
    const counters = this.db
      .prepare("SELECT next_mother_id, next_health_record_id FROM maternal_counters WHERE singleton = 1")
      .get();
    if (counters === undefined) return null;

    const { next_mother_id, next_health_record_id } = parseRow(counterRowSchema, counters, "counters");

    const profiles: StoredMotherProfile[] = this.db
      .prepare(
        `
        SELECT id, name, age, blood_type, expected_delivery_date, medical_history_json,
               emergency_contact, created_at, last_checkup
        FROM mother_profiles
        ORDER BY id ASC
      `
      )
      .all()
      .map((row) => {
        const parsed = parseRow(profileRowSchema, row, "mother profile");
        return {
          id: parsed.id,
          name: parsed.name,
          age: parsed.age,
          blood_type: parsed.blood_type,
          expected_delivery_date: parsed.expected_delivery_date,
          medical_history: parsed.medical_history_json,
          emergency_contact: parsed.emergency_contact,
          created_at: parsed.created_at,
          last_checkup: parsed.last_checkup,
        };
      });

    const healthRecords: HealthRecord[] = this.db
      .prepare(
        `
        SELECT id, mother_id, timestamp, blood_pressure, weight, symptoms_json,
               notes, next_appointment, health_status
        FROM health_records
        ORDER BY id ASC
      `
      )
      .all()
      .map((row) => {
        const parsed = parseRow(recordRowSchema, row, "health record");
        return {
          id: parsed.id,
          mother_id: parsed.mother_id,
          timestamp: parsed.timestamp,
          blood_pressure: parsed.blood_pressure,
          weight: parsed.weight,
          symptoms: parsed.symptoms_json,
          notes: parsed.notes,
          next_appointment: parsed.next_appointment,
          health_status: parsed.health_status,
        };
      });

    return {
      nextMotherId: next_mother_id,
      nextHealthRecordId: next_health_record_id,
      profiles,
      healthRecords,
    };
  }

  save(snapshot: MaternalSnapshot): void {
    this.transaction(() => {
      this.db.exec("DELETE FROM health_records; DELETE FROM mother_profiles;");
      this.writeCounters.run(snapshot.nextMotherId, snapshot.nextHealthRecordId);
      for (const profile of snapshot.profiles) {
        this.upsertProfile.run(...profileParams(profile));
      }
      for (const record of snapshot.healthRecords) {
        this.insertRecord.run(...recordParams(record));
      }
    });
  }

  saveChange(change: SnapshotChange): void {
    this.transaction(() => {
      this.writeCounters.run(change.nextMotherId, change.nextHealthRecordId);
      this.upsertProfile.run(...profileParams(change.profile));
      if (change.record) {
        this.insertRecord.run(...recordParams(change.record));
      }
    });
  }

  close(): void {
    this.db.close();
  }

  private transaction(write: () => void) {
    this.db.exec("BEGIN IMMEDIATE");
    try {
      write();
      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    }
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS maternal_counters (
        singleton INTEGER PRIMARY KEY CHECK (singleton = 1),
        next_mother_id INTEGER NOT NULL,
        next_health_record_id INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS mother_profiles (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        age INTEGER NOT NULL,
        blood_type TEXT NOT NULL,
        expected_delivery_date TEXT NOT NULL,
        medical_history_json TEXT NOT NULL,
        emergency_contact TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_checkup TEXT
      );

      CREATE TABLE IF NOT EXISTS health_records (
        id INTEGER PRIMARY KEY,
        mother_id INTEGER NOT NULL REFERENCES mother_profiles (id),
        timestamp TEXT NOT NULL,
        blood_pressure TEXT NOT NULL,
        weight REAL NOT NULL,
        symptoms_json TEXT NOT NULL,
        notes TEXT NOT NULL,
        next_appointment TEXT,
        health_status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_health_records_mother_id
      ON health_records (mother_id, id);
    `);
  }
}

function profileParams(profile: StoredMotherProfile): unknown[] {
  return [
    profile.id,
    profile.name,
    profile.age,
    profile.blood_type,
    profile.expected_delivery_date.toString(),
    JSON.stringify(profile.medical_history),
    profile.emergency_contact,
    profile.created_at.toString(),
    profile.last_checkup?.toString() ?? null,
  ];
}

function recordParams(record: HealthRecord): unknown[] {
  return [
    record.id,
    record.mother_id,
    record.timestamp.toString(),
    record.blood_pressure,
    record.weight,
    JSON.stringify(record.symptoms),
    record.notes,
    record.next_appointment?.toString() ?? null,
    record.health_status,
  ];
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, label: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new SnapshotError(
      `Unreadable ${label} row${first ? ` (${first.path.join(".")}: ${first.message})` : ""}`
    );
  }
  return parsed.data;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return null;
  }
}
