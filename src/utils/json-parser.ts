import { err, ok } from "../lib/result";
import type { Result } from "../lib/result";

/**
 * Parse JSON from LLM responses that may include markdown code fences or explanatory text
 *
 * Models often return responses like:
 * - "Sure. Here's the analysis: ```json { "intent": "question" } ```"
 * - "```json\n{ "intent": "question" }\n```"
 * - Just the JSON: "{ "intent": "question" }"
 * - Just prose: "I cannot analyse that." (returns an error result)
 */
export function parseJsonFromLLM(text: string): Result<unknown> {
  const source = text.trim();

  const braceIndex = source.indexOf("{");
  const bracketIndex = source.indexOf("[");
  const candidates = [braceIndex, bracketIndex].filter((index) => index !== -1);

  if (candidates.length === 0) {
    return err(new Error("No JSON found in model response"));
  }

  let cleaned = source.substring(Math.min(...candidates));

  // Cut at the matching closing brace/bracket
  let depth = 0;
  let inString = false;
  let escapeNext = false;
  let jsonEnd = -1;

  for (let i = 0; i < cleaned.length; i++) {
    const char = cleaned[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === "\\") {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") {
      depth++;
    } else if (char === "}" || char === "]") {
      depth--;
      if (depth === 0) {
        jsonEnd = i + 1;
        break;
      }
    }
  }

  if (jsonEnd !== -1) {
    cleaned = cleaned.substring(0, jsonEnd);
  }

  // Models occasionally annotate JSON with // or /* */ comments
  cleaned = cleaned
    .split("\n")
    .filter((line) => !line.trim().startsWith("//"))
    .join("\n")
    .replace(/\/\*[\s\S]*?\*\//g, "");

  // Escape raw control characters inside string values
  cleaned = cleaned.replace(/"([^"\\]*(\\.[^"\\]*)*)"/g, (match) =>
    match
      .replace(/\n/g, "\\n")
      .replace(/\r/g, "\\r")
      .replace(/\t/g, "\\t")
      .replace(/[\x00-\x1F\x7F]/g, "")
  );

  try {
    const parsed: unknown = JSON.parse(cleaned.trim());
    return ok(parsed);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
