import { IPropagationRule } from "../interfaces/IPropagationRule";
import { EliminateRule } from "./eliminate";
import { OnlyChoiceRule } from "./onlyChoice";
import { NakedTwinsRule } from "./nakedTwins";

export { eliminate, EliminateRule } from "./eliminate";
export { onlyChoice, OnlyChoiceRule } from "./onlyChoice";
export { nakedTwins, findTwinPairs, NakedTwinsRule } from "./nakedTwins";

/** Rules in the order the reduction loop applies them */
export const DEFAULT_RULES: readonly IPropagationRule[] = [
  EliminateRule,
  OnlyChoiceRule,
  NakedTwinsRule,
];

/**
 * Put eliminate in front of `rules` unless it is already there. The other
 * rules only narrow candidates; without eliminate, peers can settle on the
 * same digit.
 */
export function withEliminate(
  rules: readonly IPropagationRule[]
): readonly IPropagationRule[] {
  return rules.some((rule) => rule.name === EliminateRule.name)
    ? rules
    : [EliminateRule, ...rules];
}

/**
 * Pick rules by name, keeping the default order. Eliminate is always kept:
 * without it peers can settle on the same digit. Throws on an unknown name.
 */
export function selectRules(names: readonly string[]): IPropagationRule[] {
  const known = DEFAULT_RULES.map((rule) => rule.name);
  for (const name of names) {
    if (!known.includes(name)) {
      throw new Error(
        `Unknown rule: "${name}". Valid rules: ${known.join(", ")}`
      );
    }
  }
  return DEFAULT_RULES.filter(
    (rule) => rule === EliminateRule || names.includes(rule.name)
  );
}
