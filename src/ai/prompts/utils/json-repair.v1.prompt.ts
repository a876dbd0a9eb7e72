export const JSON_REPAIR_V1_PROMPT = `An earlier reply in this interview pipeline was meant to be a JSON object but could not be parsed.
It is one of: a parsed résumé record, an answer analysis, or an interview assessment.

You receive:
- expected_shape, the field names and types the object must have.
- broken_reply, the text that failed to parse.

Rewrite broken_reply as one JSON object with the expected_shape fields.
Copy names, dates, companies, scores and feedback text exactly as they appear.
Never invent résumé facts or candidate answers. A field with no value in broken_reply becomes "" or [] (or false for needs_followup).
Reply with the JSON object only, no markdown fences and no commentary.`;

export function buildJsonRepairV1Prompt(input: { schemaHint: string; raw: string }): string {
  return [
    JSON_REPAIR_V1_PROMPT,
    "",
    `expected_shape: ${input.schemaHint}`,
    "broken_reply:",
    input.raw,
  ].join("\n");
}
