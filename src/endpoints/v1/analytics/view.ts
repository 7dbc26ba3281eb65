import type { DatasetKind } from "../../../config/analytics";
import type { DatasetBundle } from "../../../services/campaign-insights";
import {
  buildUnifiedView,
  loadDatasetBundle,
  type RawDatasetBundle,
  type UnifiedFilters,
  type UnifiedView,
  type ValidationReport,
} from "../../../services/engine";

export interface ViewRequest {
  datasets: RawDatasetBundle;
  filters?: UnifiedFilters;
}

export interface LoadedView {
  datasets: DatasetBundle;
  validation: Record<DatasetKind, ValidationReport>;
  view: UnifiedView;
}

/**
 * Validate the request's tables (tolerant) and build the filtered view.
 */
export function loadView(request: ViewRequest): LoadedView {
  const { datasets, validation } = loadDatasetBundle(request.datasets);
  const view = buildUnifiedView(
    datasets.influencers,
    datasets.posts,
    datasets.tracking,
    datasets.payouts,
    request.filters
  );
  return { datasets, validation, view };
}

/**
 * Validation and orphan details every analytics response carries in
 * `meta`.
 */
export function viewMeta(loaded: LoadedView): Record<string, unknown> {
  return {
    validation: loaded.validation,
    orphans: loaded.view.orphans,
    duplicate_influencer_ids: loaded.view.duplicateInfluencerIds,
    filters: loaded.view.filters
  };
}
