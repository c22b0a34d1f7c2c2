// ═══════════════════════════════════════════════════════════════════════════════
// MCP TOOLS — Abstract API Capabilities as Callable Tools
// ═══════════════════════════════════════════════════════════════════════════════
//
// Handlers are plain async functions over a ToolContext so they can be driven
// without a transport. registerTools() binds them to an McpServer; a handler
// that throws becomes an `isError` tool result in the SDK.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ClientRegistry, ServiceName, ToolReporter } from '../registry/index.js';
import {
  isAbstractApiError,
  isValidationError,
  type AbstractClient,
  type CompanyInfo,
  type CurrencyConversion,
  type EmailValidation,
  type ExchangeRates,
  type HolidayList,
  type IpGeolocation,
  type PhoneValidation,
  type ScrapeResult,
  type Screenshot,
  type TimezoneConversion,
  type TimezoneInfo,
  type VatValidation,
} from '../services/abstract-api/index.js';
import { McpToolReporter, type ToolExtra } from './reporter.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ToolContext {
  registry: ClientRegistry;
  reporter: ToolReporter;
}

export const TOOL_NAMES = [
  'validate_email',
  'validate_phone',
  'validate_vat',
  'geolocate_ip',
  'get_ip_info',
  'geolocate_ip_security',
  'get_timezone',
  'convert_timezone',
  'get_holidays',
  'get_exchange_rates',
  'convert_currency',
  'get_company_info',
  'scrape_url',
  'generate_screenshot',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

// ─────────────────────────────────────────────────────────────────────────────────
// SHARED RUNNER
// ─────────────────────────────────────────────────────────────────────────────────

interface RunOptions {
  /** Also report local argument errors (timezone lookup) */
  reportValidation?: boolean;
}

/**
 * Resolve the service's client and run `call`. Remote errors are reported as
 * `"<label> error: <message>"` and rethrown unchanged.
 */
async function runTool<T>(
  ctx: ToolContext,
  service: ServiceName,
  label: string,
  call: (client: AbstractClient) => Promise<T>,
  options: RunOptions = {}
): Promise<T> {
  const client = await ctx.registry.getClient(service, ctx.reporter);
  try {
    return await call(client);
  } catch (error) {
    if (isAbstractApiError(error) || (isValidationError(error) && options.reportValidation)) {
      await ctx.reporter.error(`${label} error: ${error.message}`);
    }
    throw error;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export function validateEmail(ctx: ToolContext, args: { email: string }): Promise<EmailValidation> {
  return runTool(ctx, 'email', 'Email validation', client => client.validateEmail(args.email));
}

export function validatePhone(
  ctx: ToolContext,
  args: { phone: string; country_code?: string }
): Promise<PhoneValidation> {
  return runTool(ctx, 'phone', 'Phone validation', client =>
    client.validatePhone(args.phone, args.country_code)
  );
}

export function validateVat(ctx: ToolContext, args: { vat_number: string }): Promise<VatValidation> {
  return runTool(ctx, 'vat', 'VAT validation', client => client.validateVat(args.vat_number));
}

export function geolocateIp(
  ctx: ToolContext,
  args: { ip_address: string; fields?: string }
): Promise<IpGeolocation> {
  return runTool(ctx, 'ip', 'IP geolocation', client => client.geolocateIp(args.ip_address, args.fields));
}

export function getIpInfo(ctx: ToolContext, args: { ip_address: string }): Promise<IpGeolocation> {
  return runTool(ctx, 'ip', 'IP info', client => client.getIpInfo(args.ip_address));
}

export function geolocateIpSecurity(ctx: ToolContext, args: { ip_address: string }): Promise<IpGeolocation> {
  return runTool(ctx, 'ip', 'IP geolocation security', client => client.geolocateIpSecurity(args.ip_address));
}

export function getTimezone(
  ctx: ToolContext,
  args: { location?: string; latitude?: number; longitude?: number }
): Promise<TimezoneInfo> {
  return runTool(ctx, 'timezone', 'Timezone', client => client.getTimezone(args), { reportValidation: true });
}

export function convertTimezone(
  ctx: ToolContext,
  args: { base_location: string; base_datetime: string; target_location: string }
): Promise<TimezoneConversion> {
  return runTool(ctx, 'timezone', 'Timezone conversion', client =>
    client.convertTimezone(args.base_location, args.base_datetime, args.target_location)
  );
}

export function getHolidays(
  ctx: ToolContext,
  args: { country: string; year: number; month?: number; day?: number }
): Promise<HolidayList> {
  return runTool(ctx, 'holidays', 'Holidays', client =>
    client.getHolidays(args.country, args.year, args.month, args.day)
  );
}

export function getExchangeRates(
  ctx: ToolContext,
  args: { base: string; target?: string }
): Promise<ExchangeRates> {
  return runTool(ctx, 'exchange', 'Exchange rates', client => client.getExchangeRates(args.base, args.target));
}

export function convertCurrency(
  ctx: ToolContext,
  args: { base: string; target: string; amount: number; date?: string }
): Promise<CurrencyConversion> {
  return runTool(ctx, 'exchange', 'Currency conversion', client =>
    client.convertCurrency(args.base, args.target, args.amount, args.date)
  );
}

export function getCompanyInfo(ctx: ToolContext, args: { domain: string }): Promise<CompanyInfo> {
  return runTool(ctx, 'company', 'Company info', client => client.getCompanyInfo(args.domain));
}

export function scrapeUrl(ctx: ToolContext, args: { url: string; render_js: boolean }): Promise<ScrapeResult> {
  return runTool(ctx, 'scrape', 'Scraping', client => client.scrapeUrl(args.url, args.render_js));
}

export function generateScreenshot(
  ctx: ToolContext,
  args: { url: string; width: number; height: number; full_page: boolean }
): Promise<Screenshot> {
  return runTool(ctx, 'screenshot', 'Screenshot', client =>
    client.generateScreenshot(args.url, args.width, args.height, args.full_page)
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRATION
// ─────────────────────────────────────────────────────────────────────────────────

export function toToolResult(record: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(record, null, 2) }],
    structuredContent: record,
  };
}

const ipAddress = z.string().describe('IPv4 or IPv6 address');
const currencyCode = z.string().describe('ISO 4217 currency code, e.g. "USD"');

/**
 * Register every Abstract API tool on `server`. All sessions share `registry`.
 */
export function registerTools(server: McpServer, registry: ClientRegistry): void {
  const run = async (
    tool: ToolName,
    extra: ToolExtra,
    handler: (ctx: ToolContext) => Promise<Record<string, unknown>>
  ): Promise<CallToolResult> => {
    const ctx: ToolContext = { registry, reporter: McpToolReporter.fromExtra(extra, tool) };
    return toToolResult(await handler(ctx));
  };

  server.registerTool(
    'validate_email',
    {
      title: 'Validate email',
      description:
        'Validate an email address and check deliverability: format, MX records, SMTP, ' +
        'and disposable or role-based addresses.',
      inputSchema: { email: z.string().describe('Email address to validate') },
    },
    (args, extra) => run('validate_email', extra, ctx => validateEmail(ctx, args))
  );

  server.registerTool(
    'validate_phone',
    {
      title: 'Validate phone number',
      description: 'Validate a phone number and return its formats, country, line type and carrier.',
      inputSchema: {
        phone: z.string().describe('Phone number to validate'),
        country_code: z.string().optional().describe('ISO 3166-1 alpha-2 country code'),
      },
    },
    (args, extra) => run('validate_phone', extra, ctx => validatePhone(ctx, args))
  );

  server.registerTool(
    'validate_vat',
    {
      title: 'Validate VAT number',
      description: 'Validate an EU VAT number and return the registered company.',
      inputSchema: { vat_number: z.string().describe('VAT number, e.g. "SE556656688001"') },
    },
    (args, extra) => run('validate_vat', extra, ctx => validateVat(ctx, args))
  );

  server.registerTool(
    'geolocate_ip',
    {
      title: 'Geolocate IP',
      description: 'Locate an IP address: city, region, country, coordinates, timezone and currency.',
      inputSchema: {
        ip_address: ipAddress,
        fields: z.string().optional().describe('Comma-separated fields to return'),
      },
    },
    (args, extra) => run('geolocate_ip', extra, ctx => geolocateIp(ctx, args))
  );

  server.registerTool(
    'get_ip_info',
    {
      title: 'IP information',
      description: 'Full IP record, including ISP, ASN and connection type.',
      inputSchema: { ip_address: ipAddress },
    },
    (args, extra) => run('get_ip_info', extra, ctx => getIpInfo(ctx, args))
  );

  server.registerTool(
    'geolocate_ip_security',
    {
      title: 'IP security check',
      description: 'Detect whether an IP address is a VPN, proxy, tor exit node or datacenter.',
      inputSchema: { ip_address: ipAddress },
    },
    (args, extra) => run('geolocate_ip_security', extra, ctx => geolocateIpSecurity(ctx, args))
  );

  server.registerTool(
    'get_timezone',
    {
      title: 'Current time',
      description: 'Current time and timezone for a location name, or for latitude and longitude.',
      inputSchema: {
        location: z.string().optional().describe('Location name, e.g. "Oslo, Norway"'),
        latitude: z.number().optional(),
        longitude: z.number().optional(),
      },
    },
    (args, extra) => run('get_timezone', extra, ctx => getTimezone(ctx, args))
  );

  server.registerTool(
    'convert_timezone',
    {
      title: 'Convert time',
      description: 'Convert a date and time from one location to another.',
      inputSchema: {
        base_location: z.string().describe('Source location'),
        base_datetime: z.string().describe('ISO 8601 date and time, e.g. "2025-01-15 09:00:00"'),
        target_location: z.string().describe('Target location'),
      },
    },
    (args, extra) => run('convert_timezone', extra, ctx => convertTimezone(ctx, args))
  );

  server.registerTool(
    'get_holidays',
    {
      title: 'Public holidays',
      description: 'Public holidays of a country for a year, optionally narrowed to a month or day.',
      inputSchema: {
        country: z.string().describe('ISO 3166-1 alpha-2 country code'),
        year: z.number().int(),
        month: z.number().int().min(1).max(12).optional(),
        day: z.number().int().min(1).max(31).optional(),
      },
    },
    (args, extra) => run('get_holidays', extra, ctx => getHolidays(ctx, args))
  );

  server.registerTool(
    'get_exchange_rates',
    {
      title: 'Exchange rates',
      description: 'Live exchange rates for a base currency, for all currencies or one target.',
      inputSchema: {
        base: currencyCode.default('USD'),
        target: z.string().optional().describe('Target currency; all currencies when omitted'),
      },
    },
    (args, extra) => run('get_exchange_rates', extra, ctx => getExchangeRates(ctx, args))
  );

  server.registerTool(
    'convert_currency',
    {
      title: 'Convert currency',
      description: 'Convert an amount between currencies at the live rate or a historical date.',
      inputSchema: {
        base: currencyCode,
        target: currencyCode,
        amount: z.number(),
        date: z.string().optional().describe('Historical date, YYYY-MM-DD'),
      },
    },
    (args, extra) => run('convert_currency', extra, ctx => convertCurrency(ctx, args))
  );

  server.registerTool(
    'get_company_info',
    {
      title: 'Company information',
      description: 'Company name, industry, size and location for a domain.',
      inputSchema: { domain: z.string().describe('Company domain, e.g. "example.com"') },
    },
    (args, extra) => run('get_company_info', extra, ctx => getCompanyInfo(ctx, args))
  );

  server.registerTool(
    'scrape_url',
    {
      title: 'Scrape web page',
      description: 'Fetch a web page through the scraping service, optionally rendering JavaScript.',
      inputSchema: {
        url: z.string().describe('URL to scrape'),
        render_js: z.boolean().default(false),
      },
    },
    (args, extra) => run('scrape_url', extra, ctx => scrapeUrl(ctx, args))
  );

  server.registerTool(
    'generate_screenshot',
    {
      title: 'Website screenshot',
      description: 'Capture a screenshot of a web page.',
      inputSchema: {
        url: z.string().describe('URL to capture'),
        width: z.number().int().positive().default(1920),
        height: z.number().int().positive().default(1080),
        full_page: z.boolean().default(false),
      },
    },
    (args, extra) => run('generate_screenshot', extra, ctx => generateScreenshot(ctx, args))
  );
}
