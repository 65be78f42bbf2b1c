import { describe, expect, it } from "vitest";
import { NotFoundError, SnapshotError, ValidationError } from "../../src/maternal/errors";
import { getCriticalCases, getHighRiskProfiles } from "../../src/maternal/queries";
import { MaternalRecordStore } from "../../src/maternal/store";
import {
  createTestStore,
  DAY,
  loadTestRules,
  manualClock,
  NOW,
  profileInput,
  recordInput,
  WEEK,
} from "./helpers";

describe("MaternalRecordStore profiles", () => {
  it("stores a profile exactly as given with derived fields", () => {
    const store = createTestStore();
    const input = profileInput({ medical_history: ["appendectomy"] });

    const id = store.createMotherProfile(input);

    expect(store.getMotherProfile(id)).toEqual({
      id,
      name: input.name,
      age: input.age,
      blood_type: input.blood_type,
      expected_delivery_date: input.expected_delivery_date,
      medical_history: ["appendectomy"],
      emergency_contact: input.emergency_contact,
      current_stage: "SecondTrimester",
      risk_status: "Normal",
      is_high_risk: false,
      created_at: NOW,
      last_checkup: null,
    });
  });

  it("normalizes text fields on the way in", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(
      profileInput({ name: "  Test Mother  ", blood_type: " ab- ", medical_history: [" preterm ", ""] })
    );

    const profile = store.getMotherProfile(id);
    expect(profile.name).toBe("Test Mother");
    expect(profile.blood_type).toBe("ab-");
    expect(profile.medical_history).toEqual(["preterm"]);
  });

  it("keeps any short blood type code and rejects empty or long ones", () => {
    const store = createTestStore();

    const id = store.createMotherProfile(profileInput({ blood_type: "Bombay" }));
    expect(store.getMotherProfile(id).blood_type).toBe("Bombay");
    expect(() => store.createMotherProfile(profileInput({ blood_type: "  " }))).toThrow(
      "Invalid mother profile: blood_type: blood_type must not be empty"
    );
    expect(() => store.createMotherProfile(profileInput({ blood_type: "unknown-type" }))).toThrow(
      "Invalid mother profile: blood_type: blood_type must be at most 8 characters"
    );
    expect(store.profileCount()).toBe(1);
  });

  it("rejects a delivery date at the epoch without allocating an id", () => {
    const store = createTestStore();

    expect(() => store.createMotherProfile(profileInput({ expected_delivery_date: 0n }))).toThrow(
      ValidationError
    );
    expect(() => store.createMotherProfile(profileInput({ expected_delivery_date: NOW }))).toThrow(
      "expected_delivery_date must be in the future"
    );
    expect(store.createMotherProfile(profileInput())).toBe(0);
  });

  it("rejects empty required text", () => {
    const store = createTestStore();

    expect(() => store.createMotherProfile(profileInput({ name: "   " }))).toThrow(
      "Invalid mother profile: name: name must not be empty"
    );
    expect(() => store.createMotherProfile(profileInput({ emergency_contact: "" }))).toThrow(
      "Invalid mother profile: emergency_contact: emergency_contact must not be empty"
    );
    expect(store.profileCount()).toBe(0);
  });

  it("rejects ages outside the plausible range", () => {
    const store = createTestStore();
    expect(() => store.createMotherProfile(profileInput({ age: 12 }))).toThrow(ValidationError);
    expect(() => store.createMotherProfile(profileInput({ age: 66 }))).toThrow(ValidationError);
    expect(() => store.createMotherProfile(profileInput({ age: 30.5 }))).toThrow(ValidationError);
    expect(store.createMotherProfile(profileInput({ age: 13 }))).toBe(0);
  });

  it("hands out strictly increasing ids", () => {
    const store = createTestStore();
    const ids = Array.from({ length: 25 }, () => store.createMotherProfile(profileInput()));

    expect(new Set(ids).size).toBe(ids.length);
    ids.slice(1).forEach((id, index) => {
      expect(id).toBeGreaterThan(ids[index] ?? Number.POSITIVE_INFINITY);
    });
    expect(ids[0]).toBe(0);
    expect(ids[24]).toBe(24);
  });

  it("fails with NotFound for an unknown id", () => {
    const store = createTestStore();
    expect(() => store.getMotherProfile(3)).toThrow(NotFoundError);
    expect(() => store.getMotherProfile(3)).toThrow("Mother with id=3 not found");
  });

  it("returns identical results for repeated reads", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    store.addHealthRecord(recordInput(id, { symptoms: ["nausea"] }));

    const first = store.getMotherProfile(id);
    const second = store.getMotherProfile(id);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("hands out copies that cannot change stored state", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());

    const copy = store.getMotherProfile(id);
    copy.medical_history.push("edited");
    copy.risk_status = "Critical";

    expect(store.getMotherProfile(id).medical_history).toEqual([]);
    expect(store.getMotherProfile(id).risk_status).toBe("Normal");
  });

  it("re-derives the stage as time passes", () => {
    const time = manualClock();
    const store = createTestStore(time.clock);
    const id = store.createMotherProfile(profileInput({ expected_delivery_date: NOW + 14n * WEEK }));
    expect(store.getMotherProfile(id).current_stage).toBe("SecondTrimester");

    time.advance(2n * WEEK);
    expect(store.getMotherProfile(id).current_stage).toBe("ThirdTrimester");

    time.advance(12n * WEEK);
    expect(store.getMotherProfile(id).current_stage).toBe("PostPartum");
  });
});

describe("MaternalRecordStore health records", () => {
  it("returns an empty list for a mother without records", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    expect(store.getMotherHealthRecords(id)).toEqual([]);
  });

  it("fails with NotFound when listing records of an unknown mother", () => {
    const store = createTestStore();
    expect(() => store.getMotherHealthRecords(0)).toThrow(NotFoundError);
  });

  it("rejects records for unknown mothers without allocating an id", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());

    expect(() => store.addHealthRecord(recordInput(42))).toThrow("Mother with id=42 not found");
    expect(store.addHealthRecord(recordInput(id))).toBe(0);
  });

  it("leaves the profile untouched when a record is invalid", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());

    expect(() =>
      store.addHealthRecord(recordInput(id, { blood_pressure: "170/110", weight: -2 }))
    ).toThrow(ValidationError);

    expect(store.getMotherHealthRecords(id)).toEqual([]);
    expect(store.getMotherProfile(id).risk_status).toBe("Normal");
    expect(store.addHealthRecord(recordInput(id))).toBe(0);
  });

  it("numbers records independently of mothers", () => {
    const store = createTestStore();
    const first = store.createMotherProfile(profileInput());
    const second = store.createMotherProfile(profileInput());

    expect(store.addHealthRecord(recordInput(second))).toBe(0);
    expect(store.addHealthRecord(recordInput(first))).toBe(1);
    expect(store.addHealthRecord(recordInput(second))).toBe(2);
    expect(store.getMotherHealthRecords(second).map((record) => record.id)).toEqual([0, 2]);
  });

  it("stores the record with its classification and timestamp", () => {
    const time = manualClock();
    const store = createTestStore(time.clock);
    const id = store.createMotherProfile(profileInput());
    time.advance(DAY);

    const recordId = store.addHealthRecord(
      recordInput(id, {
        blood_pressure: "135/82",
        weight: 66.4,
        symptoms: [" back pain ", "back pain", ""],
        notes: "Follow up next week",
        next_appointment: NOW + 8n * DAY,
      })
    );

    expect(store.getMotherHealthRecords(id)).toEqual([
      {
        id: recordId,
        mother_id: id,
        timestamp: NOW + DAY,
        blood_pressure: "135/82",
        weight: 66.4,
        symptoms: ["back pain"],
        notes: "Follow up next week",
        next_appointment: NOW + 8n * DAY,
        health_status: "NeedsAttention",
      },
    ]);
    expect(store.getMotherProfile(id).last_checkup).toBe(NOW + DAY);
  });

  it("treats a zero appointment as no appointment", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    store.addHealthRecord(recordInput(id, { next_appointment: 0n }));
    expect(store.getMotherHealthRecords(id)[0]?.next_appointment).toBeNull();
  });

  it("marks a hypertensive reading as a critical case", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    const other = store.createMotherProfile(profileInput());
    store.addHealthRecord(recordInput(other));

    store.addHealthRecord(recordInput(id, { blood_pressure: "150/95" }));

    expect(store.getMotherProfile(id).risk_status).toBe("Critical");
    expect(getCriticalCases(store).map((profile) => profile.id)).toEqual([id]);
    expect(getHighRiskProfiles(store).map((profile) => profile.id)).toEqual([id]);
  });

  it("recomputes the status from the newest record", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());

    store.addHealthRecord(recordInput(id, { blood_pressure: "150/95" }));
    store.addHealthRecord(recordInput(id, { blood_pressure: "118/76" }));

    const profile = store.getMotherProfile(id);
    expect(profile.risk_status).toBe("Normal");
    expect(profile.is_high_risk).toBe(false);
    expect(store.getMotherHealthRecords(id).map((record) => record.health_status)).toEqual([
      "Critical",
      "Normal",
    ]);
  });
});

describe("MaternalRecordStore snapshots", () => {
  it("restores an identical store from its own snapshot", () => {
    const rules = loadTestRules();
    const clock = () => NOW;
    const original = new MaternalRecordStore({ rules, clock });
    const older = original.createMotherProfile(profileInput({ age: 38 }));
    const younger = original.createMotherProfile(profileInput({ medical_history: ["miscarriage"] }));
    original.addHealthRecord(recordInput(older, { next_appointment: NOW + 2n * DAY }));
    original.addHealthRecord(recordInput(younger, { symptoms: ["blurred vision"] }));

    const restored = new MaternalRecordStore({ rules, clock, snapshot: original.toSnapshot() });

    expect(restored.listProfiles()).toEqual(original.listProfiles());
    expect(restored.getMotherHealthRecords(younger)).toEqual(original.getMotherHealthRecords(younger));
    expect(restored.createMotherProfile(profileInput())).toBe(2);
    expect(restored.addHealthRecord(recordInput(older))).toBe(2);
  });

  it("refuses a snapshot whose records point at missing mothers", () => {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    store.addHealthRecord(recordInput(id));
    const snapshot = store.toSnapshot();

    expect(
      () =>
        new MaternalRecordStore({
          rules: loadTestRules(),
          snapshot: { ...snapshot, profiles: [] },
        })
    ).toThrow(SnapshotError);
  });

  function snapshotWithOneRecord() {
    const store = createTestStore();
    const id = store.createMotherProfile(profileInput());
    store.addHealthRecord(recordInput(id));
    return store.toSnapshot();
  }

  it("refuses a mother counter that would hand out a stored id again", () => {
    const snapshot = snapshotWithOneRecord();

    expect(
      () =>
        new MaternalRecordStore({
          rules: loadTestRules(),
          snapshot: { ...snapshot, nextMotherId: 0 },
        })
    ).toThrow("Mother id 0 is not below the mother counter 0");
  });

  it("refuses a record counter that would hand out a stored id again", () => {
    const snapshot = snapshotWithOneRecord();

    expect(
      () =>
        new MaternalRecordStore({
          rules: loadTestRules(),
          snapshot: { ...snapshot, nextHealthRecordId: 0 },
        })
    ).toThrow("Health record id 0 is not below the record counter 0");
  });

  it("refuses duplicate mother ids", () => {
    const snapshot = snapshotWithOneRecord();
    const [profile] = snapshot.profiles;
    if (!profile) throw new Error("expected a stored profile");

    expect(
      () =>
        new MaternalRecordStore({
          rules: loadTestRules(),
          snapshot: { ...snapshot, nextMotherId: 5, profiles: [profile, { ...profile, name: "Copy" }] },
        })
    ).toThrow("Mother id 0 appears more than once");
  });

  it("refuses duplicate health record ids", () => {
    const snapshot = snapshotWithOneRecord();
    const [record] = snapshot.healthRecords;
    if (!record) throw new Error("expected a stored record");

    expect(
      () =>
        new MaternalRecordStore({
          rules: loadTestRules(),
          snapshot: { ...snapshot, nextHealthRecordId: 5, healthRecords: [record, record] },
        })
    ).toThrow("Health record id 0 appears more than once");
  });

  it("rolls back to an earlier snapshot", () => {
    const store = createTestStore();
    const first = store.createMotherProfile(profileInput());
    const before = store.toSnapshot();
    store.addHealthRecord(recordInput(first, { blood_pressure: "150/95" }));
    store.createMotherProfile(profileInput({ name: "Later Mother" }));

    store.restoreFrom(before);

    expect(store.toSnapshot()).toEqual(before);
    expect(store.getMotherProfile(first).risk_status).toBe("Normal");
    expect(store.createMotherProfile(profileInput())).toBe(1);
    expect(store.addHealthRecord(recordInput(first))).toBe(0);
  });

  it("keeps its state when a snapshot is rejected", () => {
    const store = createTestStore();
    store.createMotherProfile(profileInput());
    const before = store.toSnapshot();

    expect(() => store.restoreFrom({ ...snapshotWithOneRecord(), nextMotherId: 0 })).toThrow(
      SnapshotError
    );
    expect(store.toSnapshot()).toEqual(before);
  });
});
