import { z } from 'zod';
import type { SetRequired } from 'type-fest';
import { SETTING_KEYS, TEMPERATURE_MAX, TEMPERATURE_MIN } from '../constants/config.js';
import type { ReviewOptions } from '../types/common.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

// Accepts a number, or the text of one as typed on the command line
export const TemperatureSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(DECIMAL_PATTERN, 'Temperature must be a number')
      .transform((value) => Number(value)),
  ])
  .pipe(
    z
      .number()
      .finite('Temperature must be a finite number')
      .min(TEMPERATURE_MIN, `Temperature must be between ${TEMPERATURE_MIN} and ${TEMPERATURE_MAX}`)
      .max(TEMPERATURE_MAX, `Temperature must be between ${TEMPERATURE_MIN} and ${TEMPERATURE_MAX}`)
  );

export const SettingKeySchema = z.enum(SETTING_KEYS);

export const SettingsSchema = z.object({
  model: z.string(),
  temperature: TemperatureSchema,
  base_branch: z.string(),
  system_message: z.string(),
  review_instructions: z.string(),
});

// What may appear in .codify.config: any subset of the known keys, nothing else
export const StoredSettingsSchema = SettingsSchema.partial().strict();

// Envelope some models wrap their review in
export const ReviewEnvelopeSchema = z.object({
  response: z.string(),
});

export type ValidationResult<T = string> = {
  isValid: boolean;
  error?: string;
  sanitizedValue?: T;
};

export type ReviewRequest = SetRequired<ReviewOptions, 'branch'>;

export const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue: z.ZodIssue) => issue.message).join(', ');
