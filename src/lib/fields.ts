/**
 * Lenient lookups into tracker responses. Issue payloads carry custom and
 * optional fields, so a missing or null value falls back to a default instead
 * of failing the command.
 *
 * Paths are dotted keys with array indexes, and `//` tries alternatives:
 *   .fields.status.name
 *   .errorMessages[0]
 *   .renderedFields.description // .fields.description
 */

type PathSegment = string | number;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parsePath(path: string): PathSegment[] | null {
  const trimmed = path.trim();
  if (trimmed === ".") {
    return [];
  }

  const pattern = /\.([A-Za-z_$][\w$]*)|\[(\d+)\]/y;
  const segments: PathSegment[] = [];
  while (pattern.lastIndex < trimmed.length) {
    const match = pattern.exec(trimmed);
    if (!match) {
      return null;
    }
    segments.push(match[1] ?? Number(match[2]));
  }
  return segments.length > 0 ? segments : null;
}

export function lookup(value: unknown, path: string): unknown {
  const segments = parsePath(path);
  if (!segments) {
    return undefined;
  }

  let current = value;
  for (const segment of segments) {
    if (typeof segment === "number") {
      current = Array.isArray(current) ? current[segment] : undefined;
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}

function render(value: unknown): string | null {
  if (value === undefined || value === null || value === false) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Like {@link extract} but over an already decoded body. */
export function extractValue(document: unknown, path: string, defaultValue = "N/A"): string {
  for (const alternative of path.split("//")) {
    const rendered = render(lookup(document, alternative));
    if (rendered !== null) {
      return rendered;
    }
  }
  return defaultValue;
}

export function extract(json: string, path: string, defaultValue = "N/A"): string {
  const document = parseJson(json);
  if (document === undefined) {
    return defaultValue;
  }
  return extractValue(document, path, defaultValue);
}
