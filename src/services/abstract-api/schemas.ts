// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS — Typed Records for Every Capability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each schema is the single source of truth for its record; the exported type
// is inferred from it. Required fields missing from a body fail decoding.
// Unknown fields are dropped. Optional fields accept both absence and null.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ok, err, type Result } from '../../types/result.js';
import { ResponseDecodeError } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SHARED PIECES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A number the API sometimes sends as a numeric string ("0.80").
 */
const Numeric = z.union([
  z.number(),
  z.string().trim().min(1).transform(Number).pipe(z.number()),
]);

const Integer = Numeric.pipe(z.number().int());

const StringMap = z.record(z.string());

const UnknownMap = z.record(z.unknown());

/**
 * Boolean check result as the email endpoint reports it: `{ value, text }`.
 */
export const FlagSchema = z.object({
  value: z.boolean().nullable(),
  text: z.string().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION RECORDS
// ─────────────────────────────────────────────────────────────────────────────────

export const EmailValidationSchema = z.object({
  email: z.string(),
  autocorrect: z.string().nullish(),
  deliverability: z.string(),
  quality_score: Numeric,
  is_valid_format: FlagSchema,
  is_free_email: FlagSchema,
  is_disposable_email: FlagSchema,
  is_role_email: FlagSchema,
  is_catchall_email: FlagSchema,
  is_mx_found: FlagSchema,
  is_smtp_valid: FlagSchema,
});

export const PhoneValidationSchema = z.object({
  phone: z.string(),
  valid: z.boolean(),
  format: StringMap,
  country: StringMap,
  location: z.string().nullish(),
  type: z.string().nullish(),
  carrier: z.string().nullish(),
});

export const VatValidationSchema = z.object({
  vat_number: z.string(),
  valid: z.boolean(),
  company: z.record(z.string().nullable()),
  country: StringMap,
});

// ─────────────────────────────────────────────────────────────────────────────────
// GEOLOCATION & TIME
// ─────────────────────────────────────────────────────────────────────────────────

export const IpGeolocationSchema = z.object({
  ip_address: z.string(),
  city: z.string().nullish(),
  city_geoname_id: Integer.nullish(),
  region: z.string().nullish(),
  region_iso_code: z.string().nullish(),
  region_geoname_id: Integer.nullish(),
  postal_code: z.string().nullish(),
  country: z.string().nullish(),
  country_code: z.string().nullish(),
  country_geoname_id: Integer.nullish(),
  country_is_eu: z.boolean().nullish(),
  continent: z.string().nullish(),
  continent_code: z.string().nullish(),
  continent_geoname_id: Integer.nullish(),
  longitude: Numeric.nullish(),
  latitude: Numeric.nullish(),
  security: UnknownMap.nullish(),
  timezone: UnknownMap.nullish(),
  flag: StringMap.nullish(),
  currency: StringMap.nullish(),
  connection: UnknownMap.nullish(),
});

export const TimezoneInfoSchema = z.object({
  requested_location: z.string().nullish(),
  latitude: Numeric.nullish(),
  longitude: Numeric.nullish(),
  timezone_name: z.string(),
  timezone_abbreviation: z.string(),
  timezone_offset: Integer,
  timezone_location: z.string().nullish(),
  datetime: z.string(),
  date: z.string(),
  time: z.string(),
  year: z.string(),
  month: z.string(),
  day: z.string(),
  hour: z.string(),
  minute: z.string(),
  second: z.string(),
  gmt_offset: Integer.nullish(),
  is_dst: z.boolean().nullish(),
});

export const TimezoneConversionSchema = z.object({
  base_location: z.string(),
  base_timezone: UnknownMap,
  base_datetime: z.string(),
  target_location: z.string(),
  target_timezone: UnknownMap,
  target_datetime: z.string(),
});

export const HolidaySchema = z.object({
  name: z.string(),
  name_local: z.string().nullish(),
  language: z.string().nullish(),
  description: z.string().nullish(),
  country: z.string(),
  location: z.string().nullish(),
  type: z.string(),
  date: z.string(),
  date_year: z.string(),
  date_month: z.string(),
  date_day: z.string(),
  week_day: z.string(),
});

export const HolidayListSchema = z.object({
  holidays: z.array(HolidaySchema).default([]),
});

// ─────────────────────────────────────────────────────────────────────────────────
// CURRENCY
// ─────────────────────────────────────────────────────────────────────────────────

export const ExchangeRatesSchema = z.object({
  base: z.string(),
  last_updated: Integer,
  exchange_rates: z.record(Numeric),
});

export const CurrencyConversionSchema = ExchangeRatesSchema.extend({
  target: z.string().nullish(),
  date: z.string().nullish(),
  amount: Numeric.nullish(),
  converted_amount: Numeric.nullish(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENRICHMENT, SCRAPING, SCREENSHOTS
// ─────────────────────────────────────────────────────────────────────────────────

export const CompanyInfoSchema = z.object({
  name: z.string().nullish(),
  domain: z.string(),
  year_founded: Integer.nullish(),
  industry: z.string().nullish(),
  employees_count: Integer.nullish(),
  locality: z.string().nullish(),
  country: z.string().nullish(),
  linkedin_url: z.string().nullish(),
  logo_url: z.string().nullish(),
});

export const ScrapeResultSchema = z.object({
  url: z.string(),
  content: z.string().nullish(),
  html: z.string().nullish(),
  links: z.array(z.string()).nullish(),
  images: z.array(z.string()).nullish(),
  metadata: UnknownMap.nullish(),
});

export const ScreenshotSchema = z.object({
  success: z.boolean(),
  url: z.string(),
  image_data: z.string(),
  content_type: z.string().nullish(),
  note: z.string().nullish(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// RECORD TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type Flag = Readonly<z.infer<typeof FlagSchema>>;
export type EmailValidation = Readonly<z.infer<typeof EmailValidationSchema>>;
export type PhoneValidation = Readonly<z.infer<typeof PhoneValidationSchema>>;
export type VatValidation = Readonly<z.infer<typeof VatValidationSchema>>;
export type IpGeolocation = Readonly<z.infer<typeof IpGeolocationSchema>>;
export type TimezoneInfo = Readonly<z.infer<typeof TimezoneInfoSchema>>;
export type TimezoneConversion = Readonly<z.infer<typeof TimezoneConversionSchema>>;
export type Holiday = Readonly<z.infer<typeof HolidaySchema>>;
export type HolidayList = Readonly<z.infer<typeof HolidayListSchema>>;
export type ExchangeRates = Readonly<z.infer<typeof ExchangeRatesSchema>>;
export type CurrencyConversion = Readonly<z.infer<typeof CurrencyConversionSchema>>;
export type CompanyInfo = Readonly<z.infer<typeof CompanyInfoSchema>>;
export type ScrapeResult = Readonly<z.infer<typeof ScrapeResultSchema>>;
export type Screenshot = Readonly<z.infer<typeof ScreenshotSchema>>;

// ─────────────────────────────────────────────────────────────────────────────────
// DECODING
// ─────────────────────────────────────────────────────────────────────────────────

const MAX_REPORTED_ISSUES = 3;

function describeIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Decode a response document into a capability's record.
 *
 * @param capability - Human-readable capability name used in the error message
 */
export function decodeRecord<S extends z.ZodTypeAny>(
  schema: S,
  document: unknown,
  capability: string
): Result<z.output<S>, ResponseDecodeError> {
  const parsed = schema.safeParse(document);
  if (parsed.success) {
    return ok(parsed.data);
  }

  return err(
    new ResponseDecodeError(
      `Invalid ${capability} response: ${describeIssues(parsed.error.issues)}`,
      { issues: parsed.error.issues }
    )
  );
}
