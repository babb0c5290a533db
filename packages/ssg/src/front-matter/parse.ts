/**
 * Front-matter parsing
 *
 * Grammar (line oriented):
 *
 *   file        := block? body
 *   block       := "---" EOL (assignment | blank)* "---" EOL?
 *   assignment  := key "=" '"' chars '"'
 *   key         := [A-Za-z_][A-Za-z0-9_.-]*
 *
 * Inside a value, `\"`, `\\` and `\n` are escapes. One blank line directly after the
 * closing marker separates block from body and is not part of the body.
 */

import { DiagnosticAccumulator, withStub, type Diagnosed } from "@sssg/shared";
import { siteDiagnostic, type SiteDiagnostic } from "../diagnostics.js";

export const FRONT_MATTER_MARKER = "---";

export const FRONT_MATTER_KEY = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export type FrontMatterData = Readonly<Record<string, string>>;

export interface ParsedSource {
  readonly frontMatter: FrontMatterData;
  readonly body: string;
  /** True when the file opened with a front-matter marker. */
  readonly hasFrontMatter: boolean;
}

interface Line {
  /** Line text without its terminator. */
  content: string;
  /** Offset just past the terminator. */
  next: number;
  terminated: boolean;
}

function readLine(text: string, start: number): Line {
  const nl = text.indexOf("\n", start);
  if (nl === -1) {
    return { content: text.slice(start), next: text.length, terminated: false };
  }
  const end = nl > start && text[nl - 1] === "\r" ? nl - 1 : nl;
  return { content: text.slice(start, end), next: nl + 1, terminated: true };
}

type ValueResult = { ok: true; value: string } | { ok: false; reason: string };

function decodeValue(raw: string): ValueResult {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return { ok: false, reason: 'value must be wrapped in double quotes' };
  }
  const inner = raw.slice(1, -1);
  let out = "";
  for (let i = 0; i < inner.length; i++) {
    const ch = inner.charAt(i);
    if (ch === "\\") {
      if (i === inner.length - 1) {
        return { ok: false, reason: 'value is never closed: its final " is escaped' };
      }
      const escaped = inner.charAt(i + 1);
      if (escaped === '"' || escaped === "\\") {
        out += escaped;
        i++;
        continue;
      }
      if (escaped === "n") {
        out += "\n";
        i++;
        continue;
      }
      out += ch;
      continue;
    }
    if (ch === '"') {
      return { ok: false, reason: 'unescaped " inside value' };
    }
    out += ch;
  }
  return { ok: true, value: out };
}

type AssignmentResult =
  | { ok: true; key: string; value: string }
  | { ok: false; key?: string; reason: string };

function parseAssignment(content: string): AssignmentResult {
  const eq = content.indexOf("=");
  if (eq === -1) {
    return { ok: false, reason: 'expected key = "value"' };
  }
  const key = content.slice(0, eq).trim();
  if (!FRONT_MATTER_KEY.test(key)) {
    return { ok: false, reason: key ? `invalid key "${key}"` : "missing key before =" };
  }
  const decoded = decodeValue(content.slice(eq + 1).trim());
  if (!decoded.ok) {
    return { ok: false, key, reason: decoded.reason };
  }
  return { ok: true, key, value: decoded.value };
}

/**
 * Split a content file into its front-matter mapping and body.
 *
 * A file that does not start with the marker is all body. A malformed block yields a
 * stub with an empty mapping plus the diagnostics that explain it; for an unclosed
 * block the stub's body is the whole text.
 */
export function parseFrontMatter(text: string, source?: string): Diagnosed<ParsedSource, SiteDiagnostic> {
  const input = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const acc = new DiagnosticAccumulator<SiteDiagnostic>();

  const opening = readLine(input, 0);
  if (opening.content !== FRONT_MATTER_MARKER) {
    return acc.wrap({ frontMatter: {}, body: input, hasFrontMatter: false });
  }

  // Find the closing marker first; without one nothing after line 1 is front matter.
  const blockLines: { content: string; number: number }[] = [];
  let pos = opening.next;
  let lineNo = 1;
  let bodyStart: number | null = null;
  while (opening.terminated && pos < input.length) {
    const line = readLine(input, pos);
    lineNo++;
    pos = line.next;
    if (line.content === FRONT_MATTER_MARKER) {
      bodyStart = line.next;
      break;
    }
    blockLines.push({ content: line.content, number: lineNo });
  }

  if (bodyStart === null) {
    const diagnostic = siteDiagnostic("sssg/malformed-front-matter", {
      message: `front-matter block opened on line 1 is never closed with "${FRONT_MATTER_MARKER}"`,
      source,
      line: 1,
    });
    acc.push(diagnostic);
    return acc.wrap(withStub<ParsedSource>({ frontMatter: {}, body: input, hasFrontMatter: true }, diagnostic));
  }

  const data: Record<string, string> = {};
  const seenOn = new Map<string, number>();
  let malformed = false;

  for (const line of blockLines) {
    if (line.content.trim() === "") continue;

    const result = parseAssignment(line.content);
    if (!result.ok) {
      malformed = true;
      acc.push(siteDiagnostic("sssg/malformed-front-matter", {
        message: `line is not a key = "value" assignment: ${result.reason}`,
        source,
        field: result.key,
        line: line.number,
      }));
      continue;
    }

    const previous = seenOn.get(result.key);
    if (previous !== undefined) {
      acc.push(siteDiagnostic("sssg/duplicate-key", {
        message: `assigned again (first on line ${previous}); the last value wins`,
        source,
        field: result.key,
        line: line.number,
      }));
    }
    seenOn.set(result.key, line.number);
    data[result.key] = result.value;
  }

  if (malformed) {
    const first = acc.diagnostics.find((d) => d.code === "sssg/malformed-front-matter");
    const stub: ParsedSource = { frontMatter: {}, body: input.slice(bodyStart), hasFrontMatter: true };
    return acc.wrap(first ? withStub(stub, first) : stub);
  }

  // One separating blank line belongs to the block, not the body.
  const separator = readLine(input, bodyStart);
  if (separator.terminated && separator.content.trim() === "") {
    bodyStart = separator.next;
  }

  return acc.wrap({ frontMatter: data, body: input.slice(bodyStart), hasFrontMatter: true });
}
