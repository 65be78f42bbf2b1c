import { loadClassifierRulesFromFile } from "./classifier";
import { isMaternalError, UnknownOperationError } from "./errors";
import { createLogger, type Logger } from "./logger";
import {
  getCriticalCases,
  getHighRiskProfiles,
  getUpcomingAppointments,
  summarizeRiskStatuses,
} from "./queries";
import { SnapshotRepository, SqliteSnapshotRepository } from "./snapshot";
import { MaternalRecordStore } from "./store";
import { ClassifierRules, Clock, RiskSummary, SnapshotChange } from "./types";
import {
  emptyRequestSchema,
  healthRecordPayloadSchema,
  motherIdRequestSchema,
  motherProfilePayloadSchema,
  motherRecordsRequestSchema,
  parsePayload,
  upcomingAppointmentsRequestSchema,
} from "./validation";

export const MATERNAL_OPERATIONS = [
  "create_mother_profile",
  "get_mother_profile",
  "add_health_record",
  "get_mother_health_records",
  "get_critical_cases",
  "get_high_risk_profiles",
  "get_upcoming_appointments",
] as const;

export type MaternalOperation = (typeof MATERNAL_OPERATIONS)[number];

type WriteOperation = "create_mother_profile" | "add_health_record";
type ReadOperation = Exclude<MaternalOperation, WriteOperation>;

interface WriteOutcome {
  result: unknown;
  change: SnapshotChange;
}

type ReadHandler = (store: MaternalRecordStore, payload: unknown) => unknown;
type WriteHandler = (store: MaternalRecordStore, payload: unknown) => WriteOutcome;

const writeHandlers: Record<WriteOperation, WriteHandler> = {
  create_mother_profile: (store, payload) => {
    const id = store.createMotherProfile(
      parsePayload(motherProfilePayloadSchema, payload, "mother profile")
    );
    return { result: { id }, change: store.changeFor(id, false) };
  },
  add_health_record: (store, payload) => {
    const input = parsePayload(healthRecordPayloadSchema, payload, "health record");
    const id = store.addHealthRecord(input);
    return { result: { id }, change: store.changeFor(input.mother_id, true) };
  },
};

const readHandlers: Record<ReadOperation, ReadHandler> = {
  get_mother_profile: (store, payload) =>
    store.getMotherProfile(parsePayload(motherIdRequestSchema, payload, "request").id),
  get_mother_health_records: (store, payload) => ({
    records: store.getMotherHealthRecords(
      parsePayload(motherRecordsRequestSchema, payload, "request").mother_id
    ),
  }),
  get_critical_cases: (store, payload) => {
    parsePayload(emptyRequestSchema, payload ?? {}, "request");
    return { profiles: getCriticalCases(store) };
  },
  get_high_risk_profiles: (store, payload) => {
    parsePayload(emptyRequestSchema, payload ?? {}, "request");
    return { profiles: getHighRiskProfiles(store) };
  },
  get_upcoming_appointments: (store, payload) => ({
    appointments: getUpcomingAppointments(
      store,
      parsePayload(upcomingAppointmentsRequestSchema, payload, "request").window_days
    ),
  }),
};

function isWriteOperation(operation: MaternalOperation): operation is WriteOperation {
  return operation === "create_mother_profile" || operation === "add_health_record";
}

const OPERATION_NAMES: ReadonlySet<string> = new Set(MATERNAL_OPERATIONS);

export function isMaternalOperation(name: string): name is MaternalOperation {
  return OPERATION_NAMES.has(name);
}

export interface MaternalServiceOptions {
  store: MaternalRecordStore;
  repository?: SnapshotRepository | null;
  logger?: Logger;
}

export interface OpenMaternalServiceOptions {
  dbPath: string;
  rules?: ClassifierRules;
  rulesPath?: string;
  clock?: Clock;
  logger?: Logger;
}

export interface ServiceHealth {
  rulesVersion: string;
  profiles: number;
  riskSummary: RiskSummary;
}

/**
 * Runs named operations against one record store. Successful writes are
 * persisted before the call returns; a write whose persistence fails is
 * undone in memory too. `close` takes a final snapshot.
 */
export class MaternalService {
  readonly store: MaternalRecordStore;
  private readonly repository: SnapshotRepository | null;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: MaternalServiceOptions) {
    this.store = options.store;
    this.repository = options.repository ?? null;
    this.logger = options.logger ?? createLogger({ name: "maternal-service" });
  }

  static open(options: OpenMaternalServiceOptions): MaternalService {
    const logger = options.logger ?? createLogger({ name: "maternal-service" });
    const rules =
      options.rules ??
      loadClassifierRulesFromFile(options.rulesPath ?? "src/config/rules.maternal.v1.json");
    const repository = new SqliteSnapshotRepository(options.dbPath);

    try {
      const snapshot = repository.load();
      const store = new MaternalRecordStore({ rules, clock: options.clock, snapshot });
      logger.info(
        {
          rulesVersion: rules.version,
          restored: snapshot !== null,
          profiles: store.profileCount(),
        },
        "maternal record store opened"
      );
      return new MaternalService({ store, repository, logger });
    } catch (error) {
      repository.close();
      throw error;
    }
  }

  invoke(operation: string, payload: unknown): unknown {
    if (this.closed) {
      throw new Error("Maternal service is closed");
    }
    if (!isMaternalOperation(operation)) {
      this.logger.warn({ operation }, "unknown operation requested");
      throw new UnknownOperationError(operation);
    }

    const started = Date.now();
    try {
      const result = isWriteOperation(operation)
        ? this.write(operation, payload)
        : readHandlers[operation](this.store, payload);
      this.logger.info({ operation, durationMs: Date.now() - started }, "operation completed");
      return result;
    } catch (error) {
      if (isMaternalError(error)) {
        this.logger.warn(
          { operation, code: error.code, durationMs: Date.now() - started },
          error.message
        );
      } else {
        this.logger.error({ operation, err: error }, "operation failed unexpectedly");
      }
      throw error;
    }
  }

  health(): ServiceHealth {
    return {
      rulesVersion: this.store.rules.version,
      profiles: this.store.profileCount(),
      riskSummary: summarizeRiskStatuses(this.store),
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.repository) return;
    try {
      this.persist();
      this.logger.info({ profiles: this.store.profileCount() }, "final snapshot written");
    } finally {
      this.repository.close();
    }
  }

  private write(operation: WriteOperation, payload: unknown): unknown {
    if (!this.repository) {
      return writeHandlers[operation](this.store, payload).result;
    }

    const before = this.store.toSnapshot();
    const { result, change } = writeHandlers[operation](this.store, payload);
    try {
      this.repository.saveChange(change);
    } catch (error) {
      this.store.restoreFrom(before);
      throw error;
    }
    return result;
  }

  private persist() {
    this.repository?.save(this.store.toSnapshot());
  }
}
