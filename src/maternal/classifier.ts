import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigurationError } from "./errors";
import {
  BloodPressureReading,
  ClassifiableProfile,
  ClassifierRules,
  HealthClassification,
  HealthRecord,
  HealthStatus,
  PregnancyStage,
  Timestamp,
} from "./types";
import { classifierRulesSchema } from "./validation";

const NORMAL: HealthStatus = "Normal";
const NEEDS_ATTENTION: HealthStatus = "NeedsAttention";
const CRITICAL: HealthStatus = "Critical";

export const NANOS_PER_DAY = 24n * 60n * 60n * 1_000_000_000n;
export const NANOS_PER_WEEK = 7n * NANOS_PER_DAY;

const BLOOD_PRESSURE_PATTERN = /^\s*(\d{2,3})\s*\/\s*(\d{2,3})\s*(?:mm\s*hg)?\s*$/i;

export function loadClassifierRulesFromFile(pathToRulesJson: string): ClassifierRules {
  const absolutePath = resolve(pathToRulesJson);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read classifier rules at ${absolutePath}: ${reason}`);
  }
  return parseClassifierRules(raw);
}

export function parseClassifierRules(raw: unknown): ClassifierRules {
  const parsed = classifierRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    throw new ConfigurationError(
      `Invalid classifier rules${where}: ${first?.message ?? "unknown problem"}`
    );
  }
  return parsed.data;
}

/**
 * Derives status and high-risk flag from a profile and its records, oldest
 * first. Only the latest record and the one before it are read. Never throws:
 * unreadable values count as NeedsAttention.
 */
export function classifyHealthStatus(
  profile: ClassifiableProfile,
  history: readonly HealthRecord[],
  rules: ClassifierRules
): HealthClassification {
  const latest = history[history.length - 1];
  if (!latest) {
    return {
      status: NORMAL,
      isHighRisk: false,
      reasons: ["No health records yet; status defaults to Normal."],
    };
  }
  const previous = history[history.length - 2];

  const critical: string[] = [];
  const attention: string[] = [];

  evaluateBloodPressure(latest.blood_pressure, rules, critical, attention);
  evaluateSymptoms(latest.symptoms, rules, critical, attention);
  evaluateWeight(latest, previous, rules, critical, attention);

  const complications = findComplications(profile.medical_history, rules);
  if (complications.length > 0) {
    attention.push(`Medical history lists prior complications: ${complications.join("; ")}.`);
  }

  const status = critical.length > 0 ? CRITICAL : attention.length > 0 ? NEEDS_ATTENTION : NORMAL;
  const structural = structuralRiskFactors(profile, complications.length, rules);
  const isHighRisk = status === CRITICAL || structural.length > 0;

  const reasons = [...critical, ...attention, ...structural];
  if (reasons.length === 0) {
    reasons.push(`No concerns found under rules ${rules.version}.`);
  }

  return { status, isHighRisk, reasons };
}

export function parseBloodPressure(raw: string): BloodPressureReading | null {
  const match = BLOOD_PRESSURE_PATTERN.exec(raw);
  if (!match) return null;

  const systolic = Number.parseInt(match[1] ?? "", 10);
  const diastolic = Number.parseInt(match[2] ?? "", 10);
  if (!Number.isFinite(systolic) || !Number.isFinite(diastolic)) return null;
  if (systolic <= diastolic) return null;

  return { systolic, diastolic };
}

export function derivePregnancyStage(
  expectedDeliveryDate: Timestamp,
  now: Timestamp,
  rules: ClassifierRules
): PregnancyStage {
  if (expectedDeliveryDate <= now) return "PostPartum";

  const weeksRemaining = Number((expectedDeliveryDate - now) / NANOS_PER_WEEK);
  if (weeksRemaining <= rules.stages.thirdTrimesterMaxWeeksRemaining) return "ThirdTrimester";
  if (weeksRemaining <= rules.stages.secondTrimesterMaxWeeksRemaining) return "SecondTrimester";
  return "FirstTrimester";
}

export function statusSeverity(status: HealthStatus): number {
  switch (status) {
    case "Normal":
      return 0;
    case "NeedsAttention":
      return 1;
    case "Critical":
      return 2;
    default:
      return assertNever(status);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${String(value)}`);
}

function evaluateBloodPressure(
  raw: string,
  rules: ClassifierRules,
  critical: string[],
  attention: string[]
) {
  const reading = parseBloodPressure(raw);
  if (!reading) {
    attention.push(`Blood pressure "${raw}" could not be read.`);
    return;
  }

  const { systolic, diastolic } = reading;
  const bands = rules.bloodPressure;
  const label = `${systolic}/${diastolic}`;

  if (systolic >= bands.critical.systolicAtLeast || diastolic >= bands.critical.diastolicAtLeast) {
    critical.push(`Blood pressure ${label} is in the hypertensive range.`);
  } else if (
    systolic >= bands.borderline.systolicAtLeast ||
    diastolic >= bands.borderline.diastolicAtLeast
  ) {
    attention.push(`Blood pressure ${label} is borderline high.`);
  } else if (systolic < bands.low.systolicBelow || diastolic < bands.low.diastolicBelow) {
    attention.push(`Blood pressure ${label} is low.`);
  }
}

function evaluateSymptoms(
  symptoms: readonly string[],
  rules: ClassifierRules,
  critical: string[],
  attention: string[]
) {
  for (const symptom of symptoms) {
    const normalized = symptom.trim().toLowerCase();
    if (!normalized) continue;

    const criticalKeyword = findKeyword(normalized, rules.symptoms.critical);
    if (criticalKeyword) {
      critical.push(`Critical symptom reported: ${symptom.trim()}.`);
      continue;
    }
    const moderateKeyword = findKeyword(normalized, rules.symptoms.moderate);
    if (moderateKeyword) {
      attention.push(`Symptom needs follow-up: ${symptom.trim()}.`);
    }
  }
}

function evaluateWeight(
  latest: HealthRecord,
  previous: HealthRecord | undefined,
  rules: ClassifierRules,
  critical: string[],
  attention: string[]
) {
  if (!isUsableWeight(latest.weight)) {
    attention.push("Weight reading could not be used.");
    return;
  }
  if (!previous || !isUsableWeight(previous.weight)) return;

  const change = Math.abs(latest.weight - previous.weight);
  const formatted = `${change.toFixed(1)} kg`;
  if (change > rules.weightChangeKg.critical) {
    critical.push(`Weight changed by ${formatted} since the previous record.`);
  } else if (change > rules.weightChangeKg.needsAttention) {
    attention.push(`Weight changed by ${formatted} since the previous record.`);
  }
}

function structuralRiskFactors(
  profile: ClassifiableProfile,
  complicationCount: number,
  rules: ClassifierRules
): string[] {
  const factors: string[] = [];
  if (profile.age < rules.age.safeMin || profile.age > rules.age.safeMax) {
    factors.push(
      `Age ${profile.age} is outside the ${rules.age.safeMin}-${rules.age.safeMax} range.`
    );
  }
  if (complicationCount >= rules.history.highRiskComplicationCount) {
    factors.push(`${complicationCount} prior complications recorded.`);
  }
  return factors;
}

function findComplications(history: readonly string[], rules: ClassifierRules): string[] {
  return history
    .map((entry) => entry.trim())
    .filter((entry) => findKeyword(entry.toLowerCase(), rules.history.complicationMarkers) !== null);
}

function findKeyword(text: string, keywords: readonly string[]): string | null {
  for (const keyword of keywords) {
    if (text.includes(keyword.toLowerCase())) return keyword;
  }
  return null;
}

function isUsableWeight(weight: number): boolean {
  return Number.isFinite(weight) && weight > 0;
}
