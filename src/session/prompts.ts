export const AUDITOR_SYSTEM_PROMPT = "You are a specialized financial auditor. You extract data precisely.";

export function buildExtractionPrompt(documentName: string, tableHtml: string): string {
  return [
    `Analyze this HTML table from file: ${documentName}.`,
    "",
    "Goal: Extract into JSON.",
    "",
    "CRITICAL SCHEMA RULES:",
    "1. Identify 'table_type' (e.g. \"Schedule of Investments\", \"Balance Sheet\", \"Operations\", or \"Other\").",
    '2. If it is a Balance Sheet, you MUST extract keys: "total_assets", "total_liabilities", "net_assets".',
    "3. Remove commas from numbers.",
    "4. Return ONLY a JSON object.",
    "",
    "HTML:",
    tableHtml,
  ].join("\n");
}

export function buildAuditFeedback(reason: string): string {
  return `AUDIT FAILURE: ${reason}. Please re-examine the table and fix your JSON output to satisfy the math check.`;
}
