import { loadClassifierRulesFromFile, NANOS_PER_DAY, NANOS_PER_WEEK } from "../../src/maternal/classifier";
import { createLogger } from "../../src/maternal/logger";
import { MaternalRecordStore } from "../../src/maternal/store";
import {
  ClassifierRules,
  Clock,
  HealthRecordPayload,
  MotherId,
  MotherProfilePayload,
  Timestamp,
} from "../../src/maternal/types";

// 2027-01-15T08:00:00Z
export const NOW: Timestamp = 1_800_000_000_000_000_000n;
export const DAY = NANOS_PER_DAY;
export const WEEK = NANOS_PER_WEEK;

export const RULES_PATH = "src/config/rules.maternal.v1.json";

export function loadTestRules(): ClassifierRules {
  return loadClassifierRulesFromFile(RULES_PATH);
}

export function silentLogger() {
  return createLogger({ name: "maternal-test", level: "silent" });
}

export interface ManualClock {
  clock: Clock;
  advance: (nanos: bigint) => void;
}

export function manualClock(start: Timestamp = NOW): ManualClock {
  let now = start;
  return {
    clock: () => now,
    advance: (nanos) => {
      now += nanos;
    },
  };
}

export function createTestStore(clock: Clock = () => NOW): MaternalRecordStore {
  return new MaternalRecordStore({ rules: loadTestRules(), clock });
}

export function profileInput(overrides: Partial<MotherProfilePayload> = {}): MotherProfilePayload {
  return {
    name: "Test Mother",
    age: 28,
    blood_type: "O+",
    expected_delivery_date: NOW + 20n * WEEK,
    medical_history: [],
    emergency_contact: "Test Contact 555-0100",
    ...overrides,
  };
}

export function recordInput(
  motherId: MotherId,
  overrides: Partial<HealthRecordPayload> = {}
): HealthRecordPayload {
  return {
    mother_id: motherId,
    blood_pressure: "118/76",
    weight: 65,
    symptoms: [],
    notes: "",
    next_appointment: null,
    ...overrides,
  };
}
