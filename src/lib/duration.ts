import { JiraToolError } from "./errors.js";

export type DurationUnit = "w" | "d" | "h" | "m";

/**
 * Work-time factors in seconds: a week is 5 working days, a day is 8 hours.
 */
export const UNIT_SECONDS: Record<DurationUnit, number> = {
  w: 5 * 8 * 60 * 60,
  d: 8 * 60 * 60,
  h: 60 * 60,
  m: 60,
};

export interface Duration {
  readonly seconds: number;
}

interface DurationToken {
  value: number;
  unit: DurationUnit;
  start: number;
  end: number;
}

function isUnit(char: string | undefined): char is DurationUnit {
  return char === "w" || char === "d" || char === "h" || char === "m";
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

// First run of digits directly followed by a unit letter, scanning left to right.
function nextToken(text: string): DurationToken | null {
  let index = 0;
  while (index < text.length) {
    if (!isDigit(text[index])) {
      index++;
      continue;
    }

    const start = index;
    while (isDigit(text[index])) {
      index++;
    }

    const unit = text[index];
    if (isUnit(unit)) {
      return {
        value: Number.parseInt(text.slice(start, index), 10),
        unit,
        start,
        end: index + 1,
      };
    }
  }
  return null;
}

/**
 * Parses expressions such as "2h 30m", "1d 4h" or "1w 2d 4h 30m" into seconds.
 * Units may come in any order and repeat; repeated units are added together.
 */
export function parseDuration(input: string): Duration {
  let remaining = input.replace(/\s+/g, "").toLowerCase();
  let seconds = 0;

  for (let token = nextToken(remaining); token; token = nextToken(remaining)) {
    seconds += token.value * UNIT_SECONDS[token.unit];
    if (!Number.isSafeInteger(token.value) || !Number.isSafeInteger(seconds)) {
      throw new JiraToolError({ kind: "InvalidDuration", input, reason: "range" });
    }
    remaining = remaining.slice(0, token.start) + remaining.slice(token.end);
  }

  if (remaining.length > 0) {
    throw new JiraToolError({ kind: "InvalidDuration", input, reason: "format" });
  }

  if (seconds === 0) {
    throw new JiraToolError({ kind: "InvalidDuration", input, reason: "zero" });
  }

  return Object.freeze({ seconds });
}

/** Formats a seconds count as "3h 20m", "4h", "45m" or "0m". */
export function formatRemaining(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (hours > 0 && minutes > 0) {
    return `${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h`;
  }
  if (minutes > 0) {
    return `${minutes}m`;
  }
  return "0m";
}
