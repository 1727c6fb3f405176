import {
  TIME_SLOT_LABELS,
  isUnknownLocation,
  locationDisplayName,
  locationRuleId,
} from '../domain/context';
import type { RoutineContext, RoutineContextRule, RoutineTemplate } from '../domain/types';
import { isDevEnvironment } from '../utils/getEnv';

/**
 * Context-aware routine selection.
 *
 * Scoring per template:
 * - no rule: 1
 * - time slot listed: +10
 * - day category listed: +5
 * - no locations listed: +1, or current location listed: +5
 * - plus the rule's priority
 *
 * Zero scores are dropped; the highest score wins and ties keep list order.
 */

export type TemplateSelection = {
  template: RoutineTemplate | null;
  reason: string;
  /** Null when the pick came from a fallback rather than a score. */
  score: number | null;
};

const NO_RULE_SCORE = 1;

function locationMatches(rule: RoutineContextRule, context: RoutineContext): boolean {
  return rule.locationIds.includes(locationRuleId(context.location));
}

export function scoreRule(rule: RoutineContextRule, context: RoutineContext): number {
  let score = 0;
  if (rule.timeSlots.includes(context.timeSlot)) score += 10;
  if (rule.dayCategoryIds.includes(context.dayCategory.id)) score += 5;
  if (rule.locationIds.length === 0) {
    score += 1;
  } else if (locationMatches(rule, context)) {
    score += 5;
  }
  return score + rule.priority;
}

export function scoreTemplate(template: RoutineTemplate, context: RoutineContext): number {
  return template.contextRule ? scoreRule(template.contextRule, context) : NO_RULE_SCORE;
}

/** Every condition holds: slot and category listed, location listed or unrestricted. */
export function ruleMatches(rule: RoutineContextRule, context: RoutineContext): boolean {
  if (!rule.timeSlots.includes(context.timeSlot)) return false;
  if (!rule.dayCategoryIds.includes(context.dayCategory.id)) return false;
  return rule.locationIds.length === 0 || locationMatches(rule, context);
}

export function buildSelectionReason(template: RoutineTemplate, context: RoutineContext): string {
  const reasons = [`It's ${TIME_SLOT_LABELS[context.timeSlot].toLowerCase()}`];

  if (context.dayCategory.id === 'weekend') {
    reasons.push("it's the weekend");
  } else if (context.dayCategory.id === 'weekday') {
    reasons.push("it's a weekday");
  } else {
    reasons.push(`it's a ${context.dayCategory.name.toLowerCase()} day`);
  }

  if (!isUnknownLocation(context.location)) {
    reasons.push(`you're at ${locationDisplayName(context.location).toLowerCase()}`);
  }

  return `Selected '${template.name}' because ${reasons.join(' and ')}`;
}

function mostRecentlyUsed(templates: RoutineTemplate[]): RoutineTemplate | null {
  let best: RoutineTemplate | null = null;
  let bestTime = Number.NEGATIVE_INFINITY;
  for (const template of templates) {
    if (!template.lastUsedAt) continue;
    const time = Date.parse(template.lastUsedAt);
    if (time > bestTime) {
      best = template;
      bestTime = time;
    }
  }
  return best;
}

function fallbackSelection(templates: RoutineTemplate[]): TemplateSelection {
  const defaultTemplate = templates.find((template) => template.isDefault);
  if (defaultTemplate) {
    return { template: defaultTemplate, reason: 'Using default routine', score: null };
  }
  const lastUsed = mostRecentlyUsed(templates);
  if (lastUsed) {
    return { template: lastUsed, reason: 'Using most recently used routine', score: null };
  }
  return { template: templates[0] ?? null, reason: 'No matching routine found', score: null };
}

export function selectBestTemplate(templates: RoutineTemplate[], context: RoutineContext): TemplateSelection {
  let best: { template: RoutineTemplate; score: number } | null = null;

  for (const template of templates) {
    const score = scoreTemplate(template, context);
    if (isDevEnvironment()) {
      console.log(`[routine] template '${template.name}' scored ${score}`);
    }
    if (score <= 0) continue;
    if (!best || score > best.score) best = { template, score };
  }

  if (!best) return fallbackSelection(templates);
  return { template: best.template, reason: buildSelectionReason(best.template, context), score: best.score };
}
