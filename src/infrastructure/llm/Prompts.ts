export const EXTRACTION_SYSTEM_PROMPT = `You are a company research analyst. You read scraped company web pages and return structured, verifiable facts as JSON.

RULES:
1. Only report facts stated in the pages. Never guess funding amounts, dates or names.
2. Use null for unknown scalar fields and [] for unknown lists.
3. Amounts are plain numbers in US dollars (no currency symbols, no abbreviations).
4. Dates are ISO-8601 (YYYY-MM-DD or YYYY-MM when the day is unknown).`;

export const EXTRACT_RECORD_PROMPT = `Extract a structured company record for "{{subject}}" (website: {{website}}) from these pages.

{{pages}}

Respond with a JSON object:
{
  "legalName": "string or null",
  "website": "string or null",
  "foundedYear": number or null,
  "description": "one or two sentences, or null",
  "headquarters": "City, Country or null",
  "totalRaisedUsd": number or null,
  "fundingEvents": [{ "round": "Seed | Series A | ...", "amountUsd": number or null, "date": "string or null", "investors": ["..."] }],
  "leadership": [{ "name": "...", "title": "..." }],
  "founders": [{ "name": "...", "title": "..." }],
  "products": [{ "name": "...", "description": "..." }],
  "metrics": [{ "label": "customers | employees | ...", "value": "...", "asOf": "string or null" }],
  "mentions": [{ "source": "...", "headline": "...", "url": "string or null" }]
}`;
