import { HealthRecordId, MotherId } from "./types";

export interface AllocatorState {
  nextMotherId: number;
  nextHealthRecordId: number;
}

/**
 * Two independent counters, one per entity type. Each call hands out the
 * current value and then increments, so the first id in each space is 0.
 */
export class IdentifierAllocator {
  private nextMother: number;
  private nextHealthRecord: number;

  constructor(state: AllocatorState = { nextMotherId: 0, nextHealthRecordId: 0 }) {
    this.nextMother = state.nextMotherId;
    this.nextHealthRecord = state.nextHealthRecordId;
  }

  nextMotherId(): MotherId {
    const id = this.nextMother;
    this.nextMother += 1;
    return id;
  }

  nextHealthRecordId(): HealthRecordId {
    const id = this.nextHealthRecord;
    this.nextHealthRecord += 1;
    return id;
  }

  state(): AllocatorState {
    return {
      nextMotherId: this.nextMother,
      nextHealthRecordId: this.nextHealthRecord,
    };
  }
}
