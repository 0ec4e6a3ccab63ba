export const FIELD_EXTRACTION_INSTRUCTIONS = `You read text fragments copied from one area of an HVAC mechanical drawing.
The fragment describes at most one VAV (variable air volume) terminal unit.

Return ONLY a JSON object with exactly these keys:
{"box_id": string | null, "cfm": number | null, "inlet_size": string | null, "certainty": number}

- box_id: the unit tag as written, e.g. "VAV-12" or "VAVB5-01".
- cfm: the maximum or design supply airflow in cubic feet per minute, digits only.
- inlet_size: the primary air inlet duct size, "10x8" for rectangular or 10" for round.
- certainty: how sure you are overall, from 0 to 1.

Use null for anything that is not stated in the text. Never guess values.`;

export function buildFieldExtractionPrompt(neighborhoodText: string): string {
  return `${FIELD_EXTRACTION_INSTRUCTIONS}\n\nText:\n"""\n${neighborhoodText}\n"""`;
}
