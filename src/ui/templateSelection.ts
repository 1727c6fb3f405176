import { activeHabitsCount, formattedTemplateDuration } from '../domain/routineTemplates';
import type { RoutineTemplate } from '../domain/types';
import type { TemplateSelection } from '../services/routineSelector';
import { resolveHabitColor } from '../theme/colorUtils';
import { routineTemplateLabel } from './accessibility';

export type TemplateBadge = 'Default' | 'Last used';

export type TemplateCardModel = {
  id: string;
  name: string;
  description: string | null;
  habitCount: number;
  habitCountLabel: string;
  durationLabel: string;
  color: string;
  badges: TemplateBadge[];
  isSuggested: boolean;
  accessibilityLabel: string;
};

export function buildTemplateCards(
  templates: RoutineTemplate[],
  params: { lastUsedTemplateId?: string | null; suggestedTemplateId?: string | null } = {},
): TemplateCardModel[] {
  return templates.map((template) => {
    const habitCount = activeHabitsCount(template);
    const durationLabel = formattedTemplateDuration(template);
    const badges: TemplateBadge[] = [];
    if (template.isDefault) badges.push('Default');
    if (params.lastUsedTemplateId != null && template.id === params.lastUsedTemplateId) badges.push('Last used');
    return {
      id: template.id,
      name: template.name,
      description: template.description ?? null,
      habitCount,
      habitCountLabel: `${habitCount} ${habitCount === 1 ? 'habit' : 'habits'}`,
      durationLabel,
      color: resolveHabitColor(template.color),
      badges,
      isSuggested: params.suggestedTemplateId != null && template.id === params.suggestedTemplateId,
      accessibilityLabel: routineTemplateLabel(template.name, habitCount, durationLabel),
    };
  });
}

export type SmartSuggestionModel = {
  templateId: string;
  title: string;
  reason: string;
  startLabel: string;
  color: string;
};

/** Null when there is nothing to suggest. */
export function buildSmartSuggestion(selection: TemplateSelection): SmartSuggestionModel | null {
  const template = selection.template;
  if (!template) return null;
  return {
    templateId: template.id,
    title: template.name,
    reason: selection.reason,
    startLabel: `Start ${template.name}`,
    color: resolveHabitColor(template.color),
  };
}
