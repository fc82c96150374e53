import { z } from "zod";
import { JiraToolError } from "./errors.js";
import { parseJson } from "./fields.js";

export interface Transition {
  id: string;
  /** Name of the status the transition leads to */
  name: string;
}

const TransitionEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().optional(),
  to: z.object({ name: z.string().optional() }).nullish(),
});

const TransitionsResponseSchema = z.object({
  transitions: z.array(z.unknown()),
});

/**
 * Decodes a GET .../transitions body. Entries carry the target status under
 * `to.name`; the transition's own name is used when that is missing.
 * Entries without a usable id or name are skipped one by one; a body with no
 * transitions list is an InvalidResponse.
 */
export function parseTransitions(body: string, endpoint = "transitions"): Transition[] {
  const parsed = TransitionsResponseSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new JiraToolError({ kind: "InvalidResponse", endpoint, message: "expected a transitions list" });
  }

  return parsed.data.transitions.flatMap((entry) => {
    const transition = TransitionEntrySchema.safeParse(entry);
    if (!transition.success) {
      return [];
    }
    const name = transition.data.to?.name ?? transition.data.name;
    return name === undefined ? [] : [{ id: transition.data.id, name }];
  });
}

/**
 * Finds the single transition whose target status equals `desired`, ignoring
 * case. No match and several matches are both failures.
 */
export function resolveTransition(transitions: readonly Transition[], desired: string): string {
  const wanted = desired.toLowerCase();
  const matches = transitions.filter((transition) => transition.name.toLowerCase() === wanted);

  if (matches.length === 0) {
    throw new JiraToolError({
      kind: "NoMatchingTransition",
      desired,
      available: transitions.map((transition) => transition.name),
    });
  }

  const [match] = matches;
  if (matches.length > 1 || match === undefined) {
    throw new JiraToolError({
      kind: "AmbiguousTransition",
      desired,
      matches: matches.map(({ id, name }) => ({ id, name })),
    });
  }

  return match.id;
}
