import { FRONT_MATTER_KEY, FRONT_MATTER_MARKER, type FrontMatterData } from "./parse.js";

function encodeValue(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

/**
 * Inverse of parseFrontMatter: writes the mapping as a block, a separating blank
 * line, then the body untouched. Keys keep their insertion order.
 */
export function serializeFrontMatter(data: FrontMatterData, body: string): string {
  const lines = Object.entries(data).map(([key, value]) => {
    if (!FRONT_MATTER_KEY.test(key)) {
      throw new TypeError(`Cannot serialize front-matter key "${key}"`);
    }
    return `${key} = ${encodeValue(value)}`;
  });
  return [FRONT_MATTER_MARKER, ...lines, FRONT_MATTER_MARKER, "", body].join("\n");
}
