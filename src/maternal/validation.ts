import { z } from "zod";
import { ValidationError } from "./errors";
import {
  ClassifierRules,
  HealthRecordPayload,
  MotherId,
  MotherProfilePayload,
  Timestamp,
} from "./types";

export const MIN_MOTHER_AGE = 13;
export const MAX_MOTHER_AGE = 65;
export const MAX_BLOOD_TYPE_LENGTH = 8;

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// Accepts a bigint, a safe non-negative integer, or a decimal string.
export const timestampSchema: Schema<Timestamp> = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.string().regex(/^\d+$/, "must be a decimal string of nanoseconds"),
  ])
  .transform((value) => BigInt(value));

export const idSchema: Schema<MotherId> = z.number().int().nonnegative();

function requiredText(field: string) {
  return z.string().trim().min(1, `${field} must not be empty`);
}

function normalizeEntries(entries: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const entry of entries) {
    const cleaned = entry.trim();
    if (!cleaned || seen.has(cleaned)) continue;
    seen.add(cleaned);
    out.push(cleaned);
  }
  return out;
}

export const motherProfilePayloadSchema: Schema<MotherProfilePayload> = z.object({
  name: requiredText("name"),
  age: z
    .number()
    .int("age must be a whole number")
    .min(MIN_MOTHER_AGE, `age must be between ${MIN_MOTHER_AGE} and ${MAX_MOTHER_AGE}`)
    .max(MAX_MOTHER_AGE, `age must be between ${MIN_MOTHER_AGE} and ${MAX_MOTHER_AGE}`),
  blood_type: requiredText("blood_type").max(
    MAX_BLOOD_TYPE_LENGTH,
    `blood_type must be at most ${MAX_BLOOD_TYPE_LENGTH} characters`
  ),
  expected_delivery_date: timestampSchema,
  medical_history: z
    .array(z.string())
    .default([])
    .transform((entries) => entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0)),
  emergency_contact: requiredText("emergency_contact"),
});

export const healthRecordPayloadSchema: Schema<HealthRecordPayload> = z.object({
  mother_id: idSchema,
  blood_pressure: z.string(),
  weight: z.number().finite().positive("weight must be a positive number of kilograms"),
  symptoms: z.array(z.string()).default([]).transform(normalizeEntries),
  notes: z.string().default(""),
  // Zero is the legacy "no appointment" marker.
  next_appointment: z
    .union([timestampSchema, z.null()])
    .optional()
    .transform((value) => (value === undefined || value === null || value === 0n ? null : value)),
});

export const motherIdRequestSchema = z.object({ id: idSchema });

export const motherRecordsRequestSchema = z.object({ mother_id: idSchema });

export const upcomingAppointmentsRequestSchema = z.object({ window_days: z.number() });

export const emptyRequestSchema = z.object({}).passthrough();

const keywordList = z.array(z.string().trim().toLowerCase().min(1)).min(1);

export const classifierRulesSchema: Schema<ClassifierRules> = z.object({
  version: z.string().min(1),
  bloodPressure: z.object({
    critical: z.object({ systolicAtLeast: z.number(), diastolicAtLeast: z.number() }),
    borderline: z.object({ systolicAtLeast: z.number(), diastolicAtLeast: z.number() }),
    low: z.object({ systolicBelow: z.number(), diastolicBelow: z.number() }),
  }),
  weightChangeKg: z
    .object({
      critical: z.number().positive(),
      needsAttention: z.number().positive(),
    })
    .refine((value) => value.needsAttention <= value.critical, {
      message: "needsAttention must not exceed critical",
    }),
  symptoms: z.object({
    critical: keywordList,
    moderate: keywordList,
  }),
  history: z.object({
    complicationMarkers: keywordList,
    highRiskComplicationCount: z.number().int().positive(),
  }),
  age: z
    .object({ safeMin: z.number().int(), safeMax: z.number().int() })
    .refine((value) => value.safeMin <= value.safeMax, { message: "safeMin must not exceed safeMax" }),
  stages: z
    .object({
      thirdTrimesterMaxWeeksRemaining: z.number().int().nonnegative(),
      secondTrimesterMaxWeeksRemaining: z.number().int().nonnegative(),
    })
    .refine(
      (value) => value.thirdTrimesterMaxWeeksRemaining < value.secondTrimesterMaxWeeksRemaining,
      { message: "third trimester boundary must come before the second" }
    ),
});

export function parsePayload<T>(schema: Schema<T>, input: unknown, label: string): T {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const detail = first ? `${first.path ? `${first.path}: ` : ""}${first.message}` : "invalid input";
  throw new ValidationError(`Invalid ${label}: ${detail}`, issues);
}
