import { classifyHealthStatus, derivePregnancyStage } from "./classifier";
import { NotFoundError, SnapshotError, ValidationError } from "./errors";
import { IdentifierAllocator } from "./ids";
import {
  ClassifierRules,
  Clock,
  HealthRecord,
  HealthRecordId,
  HealthRecordPayload,
  MaternalSnapshot,
  SnapshotChange,
  MotherId,
  MotherProfile,
  MotherProfilePayload,
  StoredMotherProfile,
  Timestamp,
} from "./types";
import {
  healthRecordPayloadSchema,
  motherProfilePayloadSchema,
  parsePayload,
} from "./validation";

export const systemClock: Clock = () => BigInt(Date.now()) * 1_000_000n;

export interface MaternalRecordStoreOptions {
  rules: ClassifierRules;
  clock?: Clock;
  snapshot?: MaternalSnapshot | null;
}

/**
 * Owns every profile and health record of one process. Construct it empty or
 * from a snapshot; `toSnapshot` captures the full state.
 */
export class MaternalRecordStore {
  readonly rules: ClassifierRules;
  readonly clock: Clock;
  private ids = new IdentifierAllocator();
  private readonly profiles = new Map<MotherId, MotherProfile>();
  private readonly records = new Map<MotherId, HealthRecord[]>();

  constructor(options: MaternalRecordStoreOptions) {
    this.rules = options.rules;
    this.clock = options.clock ?? systemClock;

    if (options.snapshot) {
      this.restoreFrom(options.snapshot);
    }
  }

  createMotherProfile(input: MotherProfilePayload): MotherId {
    const payload = parsePayload(motherProfilePayloadSchema, input, "mother profile");
    const now = this.clock();
    if (payload.expected_delivery_date <= now) {
      throw new ValidationError("expected_delivery_date must be in the future", [
        { path: "expected_delivery_date", message: "must be after the current time" },
      ]);
    }

    const id = this.ids.nextMotherId();
    this.profiles.set(id, {
      id,
      name: payload.name,
      age: payload.age,
      blood_type: payload.blood_type,
      expected_delivery_date: payload.expected_delivery_date,
      medical_history: [...payload.medical_history],
      emergency_contact: payload.emergency_contact,
      current_stage: derivePregnancyStage(payload.expected_delivery_date, now, this.rules),
      risk_status: "Normal",
      is_high_risk: false,
      created_at: now,
      last_checkup: null,
    });
    this.records.set(id, []);
    return id;
  }

  getMotherProfile(id: MotherId): MotherProfile {
    return this.presentProfile(this.requireProfile(id), this.clock());
  }

  addHealthRecord(input: HealthRecordPayload): HealthRecordId {
    const payload = parsePayload(healthRecordPayloadSchema, input, "health record");
    const profile = this.requireProfile(payload.mother_id);
    const history = this.records.get(profile.id) ?? [];
    const timestamp = this.clock();

    const draft: HealthRecord = {
      id: -1,
      mother_id: profile.id,
      timestamp,
      blood_pressure: payload.blood_pressure,
      weight: payload.weight,
      symptoms: [...payload.symptoms],
      notes: payload.notes,
      next_appointment: payload.next_appointment,
      health_status: "Normal",
    };
    const classification = classifyHealthStatus(profile, [...history, draft], this.rules);

    // Nothing below can fail, so the write is all-or-nothing.
    const record: HealthRecord = {
      ...draft,
      id: this.ids.nextHealthRecordId(),
      health_status: classification.status,
    };
    history.push(record);
    this.records.set(profile.id, history);
    profile.risk_status = classification.status;
    profile.is_high_risk = classification.isHighRisk;
    profile.last_checkup = timestamp;
    return record.id;
  }

  getMotherHealthRecords(motherId: MotherId): HealthRecord[] {
    const profile = this.requireProfile(motherId);
    return (this.records.get(profile.id) ?? []).map(copyRecord);
  }

  listProfiles(): MotherProfile[] {
    const now = this.clock();
    return [...this.profiles.values()].map((profile) => this.presentProfile(profile, now));
  }

  latestHealthRecord(motherId: MotherId): HealthRecord | null {
    const history = this.records.get(motherId);
    const latest = history?.[history.length - 1];
    return latest ? copyRecord(latest) : null;
  }

  profileCount(): number {
    return this.profiles.size;
  }

  toSnapshot(): MaternalSnapshot {
    const state = this.ids.state();
    const profiles = [...this.profiles.values()].map(toStoredProfile);
    const healthRecords = [...this.records.values()]
      .flat()
      .sort((a, b) => a.id - b.id)
      .map(copyRecord);

    return {
      nextMotherId: state.nextMotherId,
      nextHealthRecordId: state.nextHealthRecordId,
      profiles,
      healthRecords,
    };
  }

  /**
   * Rows touched by the latest write to `motherId`: the profile, plus its
   * newest record when one was just appended.
   */
  changeFor(motherId: MotherId, includeLatestRecord: boolean): SnapshotChange {
    const state = this.ids.state();
    return {
      nextMotherId: state.nextMotherId,
      nextHealthRecordId: state.nextHealthRecordId,
      profile: toStoredProfile(this.requireProfile(motherId)),
      record: includeLatestRecord ? this.latestHealthRecord(motherId) : null,
    };
  }

  /** Replaces all state with the snapshot's. Nothing changes when the snapshot is rejected. */
  restoreFrom(snapshot: MaternalSnapshot): void {
    checkSnapshotIdentifiers(snapshot);

    this.profiles.clear();
    this.records.clear();
    this.ids = new IdentifierAllocator({
      nextMotherId: snapshot.nextMotherId,
      nextHealthRecordId: snapshot.nextHealthRecordId,
    });

    const now = this.clock();
    for (const stored of snapshot.profiles) {
      this.profiles.set(stored.id, {
        ...stored,
        medical_history: [...stored.medical_history],
        current_stage: derivePregnancyStage(stored.expected_delivery_date, now, this.rules),
        risk_status: "Normal",
        is_high_risk: false,
      });
      this.records.set(stored.id, []);
    }

    for (const record of snapshot.healthRecords) {
      this.records.get(record.mother_id)?.push(copyRecord(record));
    }

    for (const profile of this.profiles.values()) {
      const classification = classifyHealthStatus(
        profile,
        this.records.get(profile.id) ?? [],
        this.rules
      );
      profile.risk_status = classification.status;
      profile.is_high_risk = classification.isHighRisk;
    }
  }

  private requireProfile(id: MotherId): MotherProfile {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new NotFoundError(`Mother with id=${id}`);
    }
    return profile;
  }

  private presentProfile(profile: MotherProfile, now: Timestamp): MotherProfile {
    return {
      ...profile,
      medical_history: [...profile.medical_history],
      current_stage: derivePregnancyStage(profile.expected_delivery_date, now, this.rules),
    };
  }
}

// Ids must be unique and below their counter, or the next create would reuse one.
function checkSnapshotIdentifiers(snapshot: MaternalSnapshot) {
  const motherIds = new Set<MotherId>();
  for (const profile of snapshot.profiles) {
    if (motherIds.has(profile.id)) {
      throw new SnapshotError(`Mother id ${profile.id} appears more than once`);
    }
    if (profile.id >= snapshot.nextMotherId) {
      throw new SnapshotError(
        `Mother id ${profile.id} is not below the mother counter ${snapshot.nextMotherId}`
      );
    }
    motherIds.add(profile.id);
  }

  const recordIds = new Set<HealthRecordId>();
  for (const record of snapshot.healthRecords) {
    if (recordIds.has(record.id)) {
      throw new SnapshotError(`Health record id ${record.id} appears more than once`);
    }
    if (record.id >= snapshot.nextHealthRecordId) {
      throw new SnapshotError(
        `Health record id ${record.id} is not below the record counter ${snapshot.nextHealthRecordId}`
      );
    }
    if (!motherIds.has(record.mother_id)) {
      throw new SnapshotError(
        `Health record ${record.id} references missing mother ${record.mother_id}`
      );
    }
    recordIds.add(record.id);
  }
}

function toStoredProfile(profile: MotherProfile): StoredMotherProfile {
  return {
    id: profile.id,
    name: profile.name,
    age: profile.age,
    blood_type: profile.blood_type,
    expected_delivery_date: profile.expected_delivery_date,
    medical_history: [...profile.medical_history],
    emergency_contact: profile.emergency_contact,
    created_at: profile.created_at,
    last_checkup: profile.last_checkup,
  };
}

function copyRecord(record: HealthRecord): HealthRecord {
  return { ...record, symptoms: [...record.symptoms] };
}
