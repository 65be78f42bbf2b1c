import { assertNever, NANOS_PER_DAY } from "./classifier";
import { ValidationError } from "./errors";
import type { MaternalRecordStore } from "./store";
import { HealthStatus, MotherProfile, RiskSummary, UpcomingAppointment } from "./types";

export type RecordStoreView = Pick<
  MaternalRecordStore,
  "listProfiles" | "latestHealthRecord" | "clock"
>;

export function getCriticalCases(store: RecordStoreView): MotherProfile[] {
  return store.listProfiles().filter((profile) => isCritical(profile.risk_status));
}

/** Every critical case is also high risk, so this is a superset of `getCriticalCases`. */
export function getHighRiskProfiles(store: RecordStoreView): MotherProfile[] {
  return store
    .listProfiles()
    .filter((profile) => profile.is_high_risk || isCritical(profile.risk_status));
}

export function getUpcomingAppointments(
  store: RecordStoreView,
  windowDays: number
): UpcomingAppointment[] {
  if (!Number.isFinite(windowDays) || windowDays < 0) {
    throw new ValidationError("window_days must be a non-negative number", [
      { path: "window_days", message: "must not be negative" },
    ]);
  }

  const now = store.clock();
  const windowEnd = now + daysToNanos(windowDays);
  const appointments: UpcomingAppointment[] = [];

  for (const profile of store.listProfiles()) {
    const appointment = store.latestHealthRecord(profile.id)?.next_appointment ?? null;
    if (appointment === null) continue;
    if (appointment < now || appointment > windowEnd) continue;
    appointments.push({ mother_id: profile.id, next_appointment: appointment });
  }

  return appointments.sort((a, b) => {
    if (a.next_appointment !== b.next_appointment) {
      return a.next_appointment < b.next_appointment ? -1 : 1;
    }
    return a.mother_id - b.mother_id;
  });
}

export function summarizeRiskStatuses(store: RecordStoreView): RiskSummary {
  const summary: RiskSummary = { Normal: 0, NeedsAttention: 0, Critical: 0 };
  for (const profile of store.listProfiles()) {
    summary[profile.risk_status] += 1;
  }
  return summary;
}

function isCritical(status: HealthStatus): boolean {
  switch (status) {
    case "Critical":
      return true;
    case "NeedsAttention":
    case "Normal":
      return false;
    default:
      return assertNever(status);
  }
}

// Fractional days are honoured to the millisecond.
function daysToNanos(days: number): bigint {
  const wholeDays = Math.floor(days);
  const fractionMs = Math.round((days - wholeDays) * 24 * 60 * 60 * 1000);
  return BigInt(wholeDays) * NANOS_PER_DAY + BigInt(fractionMs) * 1_000_000n;
}
