/**
 * Scoring Output Contract
 *
 * The external scoring step hands back a loosely typed payload. Its shape is checked here;
 * value ranges are left to Score and ActionPlanItem, which reject out-of-range scores
 * instead of clamping them.
 */

import { z, type ZodError } from 'zod';
import { ActionPlan, hasStats } from '@vistoria/domain/action-plan';
import { ActionPlanItem } from '@vistoria/domain/action-plan-item';
import { ValidationError } from '@vistoria/domain/errors';
import type { InspectionId } from '@vistoria/domain/types';

const zOptionalText = z.string().trim().nullish();

const zAiItem = z.object({
  problem: z.string().trim().min(1, 'problem is required'),
  action: z.string().trim().min(1, 'action is required'),
  sector: zOptionalText,
  legal_basis: zOptionalText,
  deadline: zOptionalText,
  status: zOptionalText,
  score: z.number().nullish(),
  order: z.number().int().nonnegative().optional(),
});

export const zAiAnalysis = z.object({
  summary: zOptionalText,
  strengths: zOptionalText,
  score: z.number().nullish(),
  percentage: z.number().nullish(),
  items: z.array(zAiItem),
});

export type AiAnalysis = z.infer<typeof zAiAnalysis>;
export type AiAnalysisItem = z.infer<typeof zAiItem>;

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `[${issue.path.join('.') || 'root'}] ${issue.message}`)
    .join('; ');
}

/**
 * Raises ValidationError (field "ai_response") listing every shape problem.
 */
export function parseAiAnalysis(raw: unknown): AiAnalysis {
  const result = zAiAnalysis.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Resposta da IA em formato inesperado: ${formatIssues(result.error)}`,
      'ai_response'
    );
  }
  return result.data;
}

/**
 * Builds a plan from a parsed analysis. Items are added by their reported order
 * (input position breaks ties and fills in a missing order), so orderIndex ends up contiguous.
 */
export function buildActionPlan(inspectionId: InspectionId, analysis: AiAnalysis): ActionPlan {
  const plan = ActionPlan.create(inspectionId);

  const ordered = analysis.items
    .map((item, position) => ({ item, rank: item.order ?? position, position }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position);

  for (const { item } of ordered) {
    plan.addItem(
      ActionPlanItem.fromAiResponse({
        problem: item.problem,
        action: item.action,
        sector: item.sector || null,
        legalBasis: item.legal_basis || null,
        deadline: item.deadline || null,
        status: item.status || null,
        score: item.score ?? null,
      })
    );
  }

  if (analysis.summary) {
    plan.setSummary(analysis.summary, analysis.strengths ?? undefined);
  } else if (analysis.strengths) {
    plan.strengthsText = analysis.strengths;
  }

  const stats = plan.calculateStats();
  const overall = {
    score: analysis.score ?? null,
    percentage: analysis.percentage ?? null,
  };
  if (hasStats(stats)) {
    plan.setStats({ ...stats, ...overall });
  } else if (overall.score !== null || overall.percentage !== null) {
    plan.setStats({
      total_items: 0,
      resolved_items: 0,
      resolution_percentage: 0,
      by_severity: {},
      by_sector: {},
      ...overall,
    });
  }

  return plan;
}
