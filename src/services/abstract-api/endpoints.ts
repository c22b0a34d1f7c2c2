// ═══════════════════════════════════════════════════════════════════════════════
// ENDPOINTS — Fixed URL per Capability
// ═══════════════════════════════════════════════════════════════════════════════

export const ENDPOINTS = {
  email: 'https://emailvalidation.abstractapi.com/v1/',
  phone: 'https://phonevalidation.abstractapi.com/v1/',
  vat: 'https://vatapi.abstractapi.com/v1/',
  ip: 'https://ipgeolocation.abstractapi.com/v1/',
  currentTime: 'https://timezone.abstractapi.com/v1/current_time/',
  convertTime: 'https://timezone.abstractapi.com/v1/convert_time/',
  holidays: 'https://holidays.abstractapi.com/v1/',
  exchangeLive: 'https://exchange-rates.abstractapi.com/v1/live/',
  exchangeHistorical: 'https://exchange-rates.abstractapi.com/v1/historical/',
  company: 'https://companyenrichment.abstractapi.com/v1/',
  scrape: 'https://scrape.abstractapi.com/v1/',
  screenshot: 'https://screenshot.abstractapi.com/v1/',
} as const;

export type EndpointName = keyof typeof ENDPOINTS;
