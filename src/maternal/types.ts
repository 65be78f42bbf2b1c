export type PregnancyStage =
  | "FirstTrimester"
  | "SecondTrimester"
  | "ThirdTrimester"
  | "PostPartum";

export type HealthStatus = "Normal" | "NeedsAttention" | "Critical";

/** Nanoseconds since the Unix epoch. */
export type Timestamp = bigint;

export type MotherId = number;
export type HealthRecordId = number;

export type Clock = () => Timestamp;

export interface MotherProfile {
  id: MotherId;
  name: string;
  age: number;
  blood_type: string;
  expected_delivery_date: Timestamp;
  medical_history: string[];
  emergency_contact: string;
  current_stage: PregnancyStage;
  risk_status: HealthStatus;
  is_high_risk: boolean;
  created_at: Timestamp;
  last_checkup: Timestamp | null;
}

export interface HealthRecord {
  id: HealthRecordId;
  mother_id: MotherId;
  timestamp: Timestamp;
  blood_pressure: string;
  weight: number;
  symptoms: string[];
  notes: string;
  next_appointment: Timestamp | null;
  health_status: HealthStatus;
}

export interface MotherProfilePayload {
  name: string;
  age: number;
  blood_type: string;
  expected_delivery_date: Timestamp;
  medical_history: string[];
  emergency_contact: string;
}

export interface HealthRecordPayload {
  mother_id: MotherId;
  blood_pressure: string;
  weight: number;
  symptoms: string[];
  notes: string;
  next_appointment: Timestamp | null;
}

export interface UpcomingAppointment {
  mother_id: MotherId;
  next_appointment: Timestamp;
}

export interface BloodPressureReading {
  systolic: number;
  diastolic: number;
}

export interface ClassifierRules {
  version: string;
  bloodPressure: {
    critical: { systolicAtLeast: number; diastolicAtLeast: number };
    borderline: { systolicAtLeast: number; diastolicAtLeast: number };
    low: { systolicBelow: number; diastolicBelow: number };
  };
  weightChangeKg: {
    critical: number;
    needsAttention: number;
  };
  symptoms: {
    critical: string[];
    moderate: string[];
  };
  history: {
    complicationMarkers: string[];
    highRiskComplicationCount: number;
  };
  age: {
    safeMin: number;
    safeMax: number;
  };
  stages: {
    thirdTrimesterMaxWeeksRemaining: number;
    secondTrimesterMaxWeeksRemaining: number;
  };
}

export interface HealthClassification {
  status: HealthStatus;
  isHighRisk: boolean;
  reasons: string[];
}

/** Fields the classifier reads from a profile. */
export type ClassifiableProfile = Pick<MotherProfile, "age" | "medical_history">;

export interface StoredMotherProfile {
  id: MotherId;
  name: string;
  age: number;
  blood_type: string;
  expected_delivery_date: Timestamp;
  medical_history: string[];
  emergency_contact: string;
  created_at: Timestamp;
  last_checkup: Timestamp | null;
}

export interface MaternalSnapshot {
  nextMotherId: number;
  nextHealthRecordId: number;
  profiles: StoredMotherProfile[];
  /** Every record of every mother, in insertion order. */
  healthRecords: HealthRecord[];
}

/** Rows written by one create or append, plus the counters after it. */
export interface SnapshotChange {
  nextMotherId: number;
  nextHealthRecordId: number;
  profile: StoredMotherProfile;
  record: HealthRecord | null;
}

export type RiskSummary = Record<HealthStatus, number>;
