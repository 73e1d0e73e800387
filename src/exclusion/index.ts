/**
 * Row exclusion and duplicate handling.
 */

export {
  EXCLUSION_RULES,
  firstMatchingRule,
  isBlankTranscript,
  type ExclusionRule,
  type RuleContext,
} from "./rules.js";

export {
  applyExclusionRules,
  flagDuplicateAudio,
  emptyBreakdown,
  type ExclusionResult,
} from "./filter.js";
