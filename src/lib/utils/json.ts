// Lenient readers for JSON text columns
export function parseJsonArray<T>(
  text: string | null,
  guard: (value: unknown) => value is T,
): T[] {
  if (!text) return [];
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter(guard) : [];
  } catch (error) {
    console.warn("⚠️ Ignoring malformed JSON array column:", error);
    return [];
  }
}

export function parseJsonObject(text: string | null): Record<string, unknown> {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    console.warn("⚠️ Ignoring malformed JSON object column:", error);
    return {};
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

export function isString(value: unknown): value is string {
  return typeof value === "string";
}
