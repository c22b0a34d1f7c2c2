// ═══════════════════════════════════════════════════════════════════════════════
// ABSTRACT API CLIENT — One Typed Method per Remote Capability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const record = await AbstractClient.use({ apiKey }, client =>
//     client.validateEmail('someone@example.com')
//   );
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';
import { loadAbstractApiConfig, EXTENDED_TIMEOUT_MS } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { unwrapOrThrow } from '../../types/result.js';
import { ValidationError, ResponseDecodeError } from './errors.js';
import { ENDPOINTS } from './endpoints.js';
import { HttpSession, type QueryParams, type GetOptions } from './http-session.js';
import type { DecodedBody } from './normalize.js';
import {
  decodeRecord,
  EmailValidationSchema,
  PhoneValidationSchema,
  VatValidationSchema,
  IpGeolocationSchema,
  TimezoneInfoSchema,
  TimezoneConversionSchema,
  HolidayListSchema,
  ExchangeRatesSchema,
  CurrencyConversionSchema,
  CompanyInfoSchema,
  ScrapeResultSchema,
  ScreenshotSchema,
  type EmailValidation,
  type PhoneValidation,
  type VatValidation,
  type IpGeolocation,
  type TimezoneInfo,
  type TimezoneConversion,
  type HolidayList,
  type ExchangeRates,
  type CurrencyConversion,
  type CompanyInfo,
  type ScrapeResult,
  type Screenshot,
} from './schemas.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface AbstractClientOptions {
  /** Falls back to ABSTRACT_API_KEY */
  apiKey?: string;

  /** Default request timeout in ms */
  timeoutMs?: number;

  userAgent?: string;
}

export interface TimezoneQuery {
  location?: string;
  latitude?: number;
  longitude?: number;
}

export const TIMEZONE_QUERY_ERROR = 'Either location or latitude/longitude must be provided';

const SCREENSHOT_PREVIEW_HEX_CHARS = 100;
const SCREENSHOT_NOTE = 'Full image data available in response';
const DEFAULT_IMAGE_TYPE = 'image/png';

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function decodeBody<S extends z.ZodTypeAny>(
  body: DecodedBody,
  schema: S,
  capability: string
): z.output<S> {
  if (body.kind === 'binary') {
    throw new ResponseDecodeError(
      `Invalid ${capability} response: expected a JSON document, received ${body.contentType}`
    );
  }
  return unwrapOrThrow(decodeRecord(schema, body.data, capability));
}

function imageTypeOf(contentType: string): string {
  const mediaType = contentType.split(';')[0]?.trim() ?? '';
  return mediaType.startsWith('image/') ? mediaType : DEFAULT_IMAGE_TYPE;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export class AbstractClient {
  readonly apiKey: string | undefined;
  readonly timeoutMs: number;
  readonly userAgent: string;

  private session: HttpSession | null = null;
  private readonly logger = getLogger({ component: 'client' });

  constructor(options: AbstractClientOptions = {}) {
    const defaults = loadAbstractApiConfig();
    this.apiKey = options.apiKey || defaults.apiKey;
    this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    this.userAgent = options.userAgent ?? defaults.userAgent;
  }

  /**
   * Open a client, run `fn` with it and close it afterwards, also when `fn` throws.
   */
  static async use<T>(
    options: AbstractClientOptions,
    fn: (client: AbstractClient) => Promise<T>
  ): Promise<T> {
    const client = new AbstractClient(options).open();
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  get isOpen(): boolean {
    return this.session !== null;
  }

  open(): this {
    this.ensureSession();
    return this;
  }

  /**
   * Release the session. A later request opens a new one. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (!this.session) {
      return;
    }
    const session = this.session;
    this.session = null;
    session.close();
    this.logger.debug('Session closed');
  }

  private ensureSession(): HttpSession {
    if (!this.session) {
      this.session = new HttpSession({
        timeoutMs: this.timeoutMs,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json',
        },
      });
    }
    return this.session;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // REQUEST
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * GET `url` with `params` plus the API key, and return the normalized body.
   */
  async request(url: string, params: QueryParams = {}, options: GetOptions = {}): Promise<DecodedBody> {
    const query: QueryParams = { ...params };
    if (this.apiKey) {
      query.api_key = this.apiKey;
    }

    this.logger.debug('Sending request', { url, params: query, timeoutMs: options.timeoutMs ?? this.timeoutMs });

    return this.ensureSession().get(url, query, options);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // VALIDATION
  // ─────────────────────────────────────────────────────────────────────────────

  async validateEmail(email: string): Promise<EmailValidation> {
    const body = await this.request(ENDPOINTS.email, { email });
    return decodeBody(body, EmailValidationSchema, 'email validation');
  }

  async validatePhone(phone: string, countryCode?: string): Promise<PhoneValidation> {
    const body = await this.request(ENDPOINTS.phone, {
      phone,
      country_code: countryCode || undefined,
    });
    return decodeBody(body, PhoneValidationSchema, 'phone validation');
  }

  async validateVat(vatNumber: string): Promise<VatValidation> {
    const body = await this.request(ENDPOINTS.vat, { vat_number: vatNumber });
    return decodeBody(body, VatValidationSchema, 'VAT validation');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // IP GEOLOCATION
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * @param fields - Comma-separated list of fields to return
   */
  async geolocateIp(ipAddress: string, fields?: string): Promise<IpGeolocation> {
    const body = await this.request(ENDPOINTS.ip, {
      ip_address: ipAddress,
      fields: fields || undefined,
    });
    return decodeBody(body, IpGeolocationSchema, 'IP geolocation');
  }

  /** Full record, including ISP and ASN connection data. */
  async getIpInfo(ipAddress: string): Promise<IpGeolocation> {
    return this.geolocateIp(ipAddress);
  }

  /** VPN, proxy, tor and datacenter detection. */
  async geolocateIpSecurity(ipAddress: string): Promise<IpGeolocation> {
    return this.geolocateIp(ipAddress, 'security');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TIMEZONE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Current time at a location or at coordinates. A non-empty location wins.
   *
   * @throws ValidationError before any request when neither is given
   */
  async getTimezone(query: TimezoneQuery): Promise<TimezoneInfo> {
    let params: QueryParams;
    if (query.location) {
      params = { location: query.location };
    } else if (query.latitude !== undefined && query.longitude !== undefined) {
      params = { latitude: query.latitude, longitude: query.longitude };
    } else {
      throw new ValidationError(TIMEZONE_QUERY_ERROR);
    }

    const body = await this.request(ENDPOINTS.currentTime, params);
    return decodeBody(body, TimezoneInfoSchema, 'timezone');
  }

  async convertTimezone(
    baseLocation: string,
    baseDatetime: string,
    targetLocation: string
  ): Promise<TimezoneConversion> {
    const body = await this.request(ENDPOINTS.convertTime, {
      base_location: baseLocation,
      base_datetime: baseDatetime,
      target_location: targetLocation,
    });
    return decodeBody(body, TimezoneConversionSchema, 'timezone conversion');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HOLIDAYS
  // ─────────────────────────────────────────────────────────────────────────────

  async getHolidays(country: string, year: number, month?: number, day?: number): Promise<HolidayList> {
    const body = await this.request(ENDPOINTS.holidays, {
      country,
      year,
      month: month || undefined,
      day: day || undefined,
    });

    // The endpoint answers with a bare array
    if (body.kind === 'json' && Array.isArray(body.data)) {
      return unwrapOrThrow(decodeRecord(HolidayListSchema, { holidays: body.data }, 'holidays'));
    }
    return decodeBody(body, HolidayListSchema, 'holidays');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EXCHANGE RATES
  // ─────────────────────────────────────────────────────────────────────────────

  async getExchangeRates(base: string = 'USD', target?: string): Promise<ExchangeRates> {
    const body = await this.request(ENDPOINTS.exchangeLive, {
      base,
      target: target || undefined,
    });
    return decodeBody(body, ExchangeRatesSchema, 'exchange rates');
  }

  /**
   * Convert `amount` with the live rate, or the historical rate of `date` (YYYY-MM-DD).
   * The conversion itself is computed locally from the returned rate table.
   */
  async convertCurrency(base: string, target: string, amount: number, date?: string): Promise<CurrencyConversion> {
    const url = date ? ENDPOINTS.exchangeHistorical : ENDPOINTS.exchangeLive;
    const body = await this.request(url, { base, target, date: date || undefined });
    const record = decodeBody(body, CurrencyConversionSchema, 'currency conversion');

    const rates = record.exchange_rates;
    const rate = Object.hasOwn(rates, target) ? rates[target] : undefined;
    if (rate === undefined) {
      return record;
    }
    return { ...record, amount, converted_amount: amount * rate };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ENRICHMENT
  // ─────────────────────────────────────────────────────────────────────────────

  async getCompanyInfo(domain: string): Promise<CompanyInfo> {
    const body = await this.request(ENDPOINTS.company, { domain });
    return decodeBody(body, CompanyInfoSchema, 'company enrichment');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SCRAPING & SCREENSHOTS (extended timeout)
  // ─────────────────────────────────────────────────────────────────────────────

  async scrapeUrl(url: string, renderJs: boolean = false): Promise<ScrapeResult> {
    const body = await this.request(
      ENDPOINTS.scrape,
      { url, render_js: String(renderJs) },
      { timeoutMs: EXTENDED_TIMEOUT_MS }
    );

    // HTML and other text pages come back wrapped as { result }
    if (body.kind === 'text') {
      return { url, content: body.data.result };
    }
    return decodeBody(body, ScrapeResultSchema, 'scrape');
  }

  async generateScreenshot(
    url: string,
    width: number = 1920,
    height: number = 1080,
    fullPage: boolean = false
  ): Promise<Screenshot> {
    const body = await this.request(
      ENDPOINTS.screenshot,
      { url, width, height, full_page: String(fullPage) },
      { timeoutMs: EXTENDED_TIMEOUT_MS }
    );

    if (body.kind === 'binary') {
      const hex = Buffer.from(body.bytes).toString('hex');
      return {
        success: true,
        url,
        image_data: `${hex.slice(0, SCREENSHOT_PREVIEW_HEX_CHARS)}...`,
        content_type: imageTypeOf(body.contentType),
        note: SCREENSHOT_NOTE,
      };
    }
    return decodeBody(body, ScreenshotSchema, 'screenshot');
  }
}
