import { errorMessage } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { FabricModel, HotModelSource } from './fabricStatusClient';

export interface CatalogOptions {
  /** Extra hot models (beyond the baseline) kept per architecture. */
  maxExtraPerArchitecture: number;
  includeExtraHot?: boolean;
}

export interface ModelCatalog {
  /** Ordered model ids: baseline first, then selected hot models. */
  models: string[];
  baseline: string[];
  extraHot: string[];
  /** Set when hot-model discovery failed and the catalog fell back to baseline. */
  discoveryError?: string;
}

function byArchitectureThenSize(a: FabricModel, b: FabricModel): number {
  if (a.architecture !== b.architecture) return a.architecture < b.architecture ? -1 : 1;
  const sizeA = a.nParams ?? Number.POSITIVE_INFINITY;
  const sizeB = b.nParams ?? Number.POSITIVE_INFINITY;
  if (sizeA !== sizeB) return sizeA < sizeB ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Picks up to `maxPerArchitecture` models per family, smallest first.
 */
export function selectPerArchitecture(models: FabricModel[], maxPerArchitecture: number): FabricModel[] {
  const sorted = [...models].sort(byArchitectureThenSize);
  const taken = new Map<string, number>();
  const selected: FabricModel[] = [];

  for (const model of sorted) {
    const count = taken.get(model.architecture) || 0;
    if (count >= maxPerArchitecture) continue;
    taken.set(model.architecture, count + 1);
    selected.push(model);
  }

  return selected;
}

/**
 * Baseline models in configured order, followed by hot models that are not
 * already in the baseline. The order is stable for identical inputs, which the
 * round-robin pointer relies on.
 */
export function buildCatalog(
  baseline: readonly string[],
  hotModels: FabricModel[],
  options: CatalogOptions
): ModelCatalog {
  const seen = new Set<string>();
  const baselineIds: string[] = [];
  for (const id of baseline) {
    if (seen.has(id)) continue;
    seen.add(id);
    baselineIds.push(id);
  }

  const extraHot: string[] = [];
  if (options.includeExtraHot !== false) {
    const candidates = hotModels.filter(m => m.deploymentLevel === 'HOT' && !seen.has(m.id));
    for (const model of selectPerArchitecture(candidates, options.maxExtraPerArchitecture)) {
      if (seen.has(model.id)) continue;
      seen.add(model.id);
      extraHot.push(model.id);
    }
  }

  return {
    models: [...baselineIds, ...extraHot],
    baseline: baselineIds,
    extraHot,
  };
}

/**
 * Builds the catalog from live discovery, degrading to the baseline when the
 * status endpoint cannot be read.
 */
export async function loadCatalog(
  source: HotModelSource,
  baseline: readonly string[],
  options: CatalogOptions
): Promise<ModelCatalog> {
  if (options.includeExtraHot === false) {
    return buildCatalog(baseline, [], options);
  }

  try {
    const hot = await source.listModels({ hotOnly: true });
    const catalog = buildCatalog(baseline, hot, options);
    logger.info(`Catalog: ${catalog.baseline.length} baseline, ${catalog.extraHot.length} extra hot model(s)`);
    return catalog;
  } catch (error) {
    const message = errorMessage(error);
    logger.warn(`Hot model discovery failed (${message}); continuing with baseline models only`);
    return { ...buildCatalog(baseline, [], options), discoveryError: message };
  }
}
