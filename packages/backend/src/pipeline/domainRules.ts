import { normalizeLabel } from "./identity.js";

/**
 * Human need -> behaviour keywords. A NEED influences a BEHAVIORAL_PATTERN
 * when the need name contains the key and the pattern label contains one of
 * its keywords.
 */
export const NEED_BEHAVIOR_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  certainty: ["strategic", "planner", "risk", "manager", "cautious", "analytical"],
  variety: ["innovative", "creative", "explorer", "adventurous"],
  significance: ["leader", "achiever", "competitive", "ambitious"],
  connection: ["collaborative", "team", "social", "helper"],
  growth: ["learner", "developer", "improver", "student"],
  contribution: ["helper", "mentor", "teacher", "giver"]
};

export interface NeedBehaviorMatch {
  need: string;
  keyword: string;
}

export function matchNeedToBehavior(
  needLabel: string,
  patternLabel: string,
  table: Readonly<Record<string, readonly string[]>> = NEED_BEHAVIOR_KEYWORDS
): NeedBehaviorMatch | null {
  const need = normalizeLabel(needLabel);
  const pattern = normalizeLabel(patternLabel);

  for (const [needKey, keywords] of Object.entries(table)) {
    if (!need.includes(needKey)) {
      continue;
    }
    const keyword = keywords.find((candidate) => pattern.includes(candidate));
    if (keyword) {
      return { need: needKey, keyword };
    }
  }

  return null;
}
