// Prompts for the furniture analysis tiers and the holistic grouping call.
// Every prompt asks for a single JSON object; the shapes match src/grouping/schema.ts.

export function getAnalysisSystemPrompt() {
  return `You are a strict JSON-only furniture photo analyst for a resale marketplace. Describe only what is visible. Never invent brands. Answer with one JSON object and nothing else.`;
}

export function getWorkflowPrompt() {
  return `
Analyze the furniture item in this photo for a resale listing.

Return JSON:
{
  "category": "broad type, e.g. Sofa, Chair, Table, Bed, Dresser, Desk, Cabinet, Bookshelf",
  "subcategory": "specific type, e.g. Loveseat, Writing Desk, Recliner",
  "color": "dominant color",
  "material": "primary material",
  "style": "e.g. Modern, Traditional, Rustic, Industrial, Mission",
  "condition": "one of New, Like New, Good, Fair, Poor",
  "estimatedPrice": number in USD for a used-furniture marketplace, or null,
  "confidence": number between 0 and 1,
  "reasoning": "one sentence",
  "title": "listing title under 80 characters",
  "description": "two or three sentences for the listing"
}`.trim();
}

export function getCategoryAgentPrompt() {
  return `
Identify what kind of furniture this photo shows.

Return JSON: { "category": string, "subcategory": string, "confidence": number 0-1, "reasoning": string }`.trim();
}

export function getColorAgentPrompt() {
  return `
Name the dominant color of the furniture in this photo with a common color word (white, brown, gray, black, red, blue, green, or a wood tone).

Return JSON: { "color": string, "confidence": number 0-1 }`.trim();
}

export function getStyleAgentPrompt() {
  return `
Describe the style, primary material and visible condition of the furniture in this photo.
Condition must be one of New, Like New, Good, Fair, Poor.

Return JSON: { "style": string, "material": string, "condition": string, "confidence": number 0-1 }`.trim();
}

export function getPricingAgentPrompt(facts: {
  category: string;
  subcategory: string;
  color: string;
  style: string;
  material: string;
  condition: string;
}) {
  return `
Price this used furniture item for a local resale marketplace and write its listing copy.

Item:
${JSON.stringify(facts, null, 2)}

Return JSON: { "estimatedPrice": number in USD or null, "title": string under 80 characters, "description": string, "confidence": number 0-1 }`.trim();
}

export function getGroupingSystemPrompt() {
  return `You group photos of furniture by the physical item they show. Several photos may show the same piece from different angles. Use only the JSON provided. Answer with one JSON object and nothing else.`;
}

export function getGroupingUserPrompt(items: ReadonlyArray<Record<string, unknown>>) {
  return `
Each entry below describes one photo. Put photos of the same physical furniture item in the same group.
Every imageId must appear in exactly one group. Do not invent imageIds.

Photos:
${JSON.stringify(items, null, 2)}

Return JSON: { "groups": [ { "imageIds": string[], "reasoning": string, "confidence": number 0-1 } ] }`.trim();
}
