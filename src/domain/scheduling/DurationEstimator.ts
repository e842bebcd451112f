import { ICatalog } from '../catalog/ICatalog';

export const DEFAULT_BASE_DURATION = 30;
export const DEFAULT_COMPLEXITY_MULTIPLIER = 1.0;

export interface DurationTable {
  baseDurations: ReadonlyMap<string, number>;
  complexityMultipliers: ReadonlyMap<string, number>;
}

/**
 * Advisory estimate in minutes. Unknown agents and workflow types fall back to
 * defaults instead of failing.
 */
export function estimateDuration(agent: string, workflowType: string | null, table: DurationTable): number {
  const base = table.baseDurations.get(agent) ?? DEFAULT_BASE_DURATION;
  const multiplier = (workflowType !== null ? table.complexityMultipliers.get(workflowType) : undefined)
    ?? DEFAULT_COMPLEXITY_MULTIPLIER;
  return Math.floor(base * multiplier);
}

export function buildDurationTable(catalog: ICatalog): DurationTable {
  const baseDurations = new Map<string, number>();
  for (const agent of catalog.listAgents()) {
    if (agent.baseDuration !== undefined) {
      baseDurations.set(agent.name, agent.baseDuration);
    }
  }

  const complexityMultipliers = new Map<string, number>();
  for (const template of catalog.listTemplates()) {
    if (template.complexityMultiplier !== undefined) {
      complexityMultipliers.set(template.id, template.complexityMultiplier);
    }
  }

  return { baseDurations, complexityMultipliers };
}
