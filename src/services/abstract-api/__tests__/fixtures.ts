// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES — Response Bodies per Capability
// ═══════════════════════════════════════════════════════════════════════════════

export const emailBody = {
  email: 'someone@example.com',
  autocorrect: '',
  deliverability: 'DELIVERABLE',
  quality_score: 0.9,
  is_valid_format: { value: true, text: 'TRUE' },
  is_free_email: { value: false, text: 'FALSE' },
  is_disposable_email: { value: false, text: 'FALSE' },
  is_role_email: { value: false, text: 'FALSE' },
  is_catchall_email: { value: null, text: 'UNKNOWN' },
  is_mx_found: { value: true, text: 'TRUE' },
  is_smtp_valid: { value: true, text: 'TRUE' },
};

export const phoneBody = {
  phone: '14155550123',
  valid: true,
  format: { international: '+14155550123', local: '(415) 555-0123' },
  country: { code: 'US', name: 'United States', prefix: '+1' },
  location: 'California',
  type: 'mobile',
  carrier: 'Example Wireless',
};

export const vatBody = {
  vat_number: 'SE556656688001',
  valid: true,
  company: { name: 'Example AB', address: null },
  country: { code: 'SE', name: 'Sweden' },
};

export const ipBody = {
  ip_address: '203.0.113.7',
  city: 'Oslo',
  city_geoname_id: 3143244,
  region: 'Oslo County',
  region_iso_code: 'NO-03',
  region_geoname_id: 3143242,
  postal_code: '0150',
  country: 'Norway',
  country_code: 'NO',
  country_geoname_id: 3144096,
  country_is_eu: false,
  continent: 'Europe',
  continent_code: 'EU',
  continent_geoname_id: 6255148,
  longitude: 10.75,
  latitude: 59.91,
  security: { is_vpn: false },
  timezone: { name: 'Europe/Oslo', abbreviation: 'CET', gmt_offset: 1, is_dst: false },
  flag: { emoji: 'NO', png: 'https://static.example.com/flags/no.png' },
  currency: { currency_name: 'Norwegian Krone', currency_code: 'NOK' },
  connection: { autonomous_system_number: 64500, connection_type: 'Corporate', isp_name: 'Example ISP' },
};

export const timezoneBody = {
  requested_location: 'Oslo, Norway',
  latitude: 59.91,
  longitude: 10.75,
  timezone_name: 'Europe/Oslo',
  timezone_abbreviation: 'CET',
  timezone_offset: 1,
  timezone_location: 'Oslo',
  datetime: '2025-01-15 10:00:00',
  date: '2025-01-15',
  time: '10:00:00',
  year: '2025',
  month: '01',
  day: '15',
  hour: '10',
  minute: '00',
  second: '00',
  gmt_offset: 1,
  is_dst: false,
};

export const timezoneConversionBody = {
  base_location: 'Oslo',
  base_timezone: { timezone_name: 'Europe/Oslo', gmt_offset: 1 },
  base_datetime: '2025-01-15 09:00:00',
  target_location: 'Tokyo',
  target_timezone: { timezone_name: 'Asia/Tokyo', gmt_offset: 9 },
  target_datetime: '2025-01-15 17:00:00',
};

export const holidaysBody = [
  {
    name: 'Constitution Day',
    name_local: 'Grunnlovsdag',
    language: 'no',
    description: '',
    country: 'NO',
    location: 'Norway',
    type: 'National',
    date: '05/17/2025',
    date_year: '2025',
    date_month: '05',
    date_day: '17',
    week_day: 'Saturday',
  },
  {
    name: 'Christmas Day',
    name_local: 'Første juledag',
    language: 'no',
    description: '',
    country: 'NO',
    location: 'Norway',
    type: 'National',
    date: '12/25/2025',
    date_year: '2025',
    date_month: '12',
    date_day: '25',
    week_day: 'Thursday',
  },
];

export const exchangeBody = {
  base: 'USD',
  last_updated: 1736935200,
  exchange_rates: { EUR: 0.9, NOK: 11.25 },
};

export const companyBody = {
  name: 'Example Corp',
  domain: 'example.com',
  year_founded: 1999,
  industry: 'Software',
  employees_count: 250,
  locality: 'Bergen',
  country: 'Norway',
  linkedin_url: 'linkedin.com/company/example',
  logo_url: 'https://logo.example.com/example.com',
};

export const scrapeBody = {
  url: 'https://example.com/',
  content: 'Example Domain',
  html: '<html><body>Example Domain</body></html>',
  links: ['https://example.org/'],
  images: [],
  metadata: { title: 'Example Domain' },
};

export const screenshotBody = {
  success: true,
  url: 'https://example.com/',
  image_data: 'aGVsbG8=',
  content_type: 'image/png',
  note: null,
};
